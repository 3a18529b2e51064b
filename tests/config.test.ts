import { join } from "node:path";
import { loadConfig } from "../src/config.js";

describe("Configuration", () => {
  it("should apply defaults", () => {
    const config = loadConfig({});

    expect(config.lga).toBe("Wyndham");
    expect(config.council).toBe("Wyndham City Council");
    expect(config.closingWindowDays).toBe(14);
    expect(config.recentDays).toBe(7);
    expect(config.dataPath).toBeUndefined();
    expect(config.rulesPath.endsWith(join("config", "rules.json"))).toBe(true);
    expect(config.digest).toEqual({
      to: [],
      from: undefined,
      subjectPrefix: "[Wyndham]",
      limit: 25,
      onlyLocal: false,
      smtp: { host: undefined, port: 587, user: undefined, pass: undefined },
    });
  });

  it("should derive council and prefix from the locality", () => {
    const config = loadConfig({ RADAR_LGA: "Hobsons Bay" });
    expect(config.council).toBe("Hobsons Bay City Council");
    expect(config.digest.subjectPrefix).toBe("[Hobsons Bay]");
  });

  it("should read lists, flags and numbers", () => {
    const config = loadConfig({
      RADAR_CLOSING_DAYS: "0",
      RADAR_DATA_PATH: "data/grants.jsonl",
      DIGEST_TO: " a@example.org, ,b@example.org ",
      DIGEST_ONLY_LOCAL: "yes",
      SMTP_HOST: "smtp.example.org",
      SMTP_PORT: "465",
      SMTP_PASS: "test-secret",
    });

    expect(config.closingWindowDays).toBe(0);
    expect(config.dataPath).toBe("data/grants.jsonl");
    expect(config.digest.to).toEqual(["a@example.org", "b@example.org"]);
    expect(config.digest.onlyLocal).toBe(true);
    expect(config.digest.smtp).toEqual({ host: "smtp.example.org", port: 465, user: undefined, pass: "test-secret" });
  });

  it("should ignore blank values", () => {
    expect(loadConfig({ RADAR_LGA: "  ", RADAR_RECENT_DAYS: "" }).lga).toBe("Wyndham");
    expect(loadConfig({ RADAR_RECENT_DAYS: " " }).recentDays).toBe(7);
  });

  it("should fail fast on unusable numbers", () => {
    expect(() => loadConfig({ RADAR_CLOSING_DAYS: "two" })).toThrow("Invalid RADAR_CLOSING_DAYS: two");
    expect(() => loadConfig({ RADAR_RECENT_DAYS: "-1" })).toThrow("Invalid RADAR_RECENT_DAYS: -1");
    expect(() => loadConfig({ DIGEST_LIMIT: "0" })).toThrow("Invalid DIGEST_LIMIT: 0");
    expect(() => loadConfig({ SMTP_PORT: "25.5" })).toThrow("Invalid SMTP_PORT: 25.5");
  });
});
