import { join } from "node:path";
import { loadRules } from "../src/classify/rules.js";
import {
  enrichRecord,
  guessJurisdiction,
  guessType,
  urlHost,
} from "../src/classify/classifier.js";
import type { ClassifyContext } from "../src/classify/classifier.js";
import { normalizeRecord } from "../src/transform/normalize.js";
import type { RawRecord } from "../src/transform/schema.js";

const today = "2025-03-10";
const rules = loadRules(join(__dirname, "..", "config", "rules.json"));
const context: ClassifyContext = { rules, lga: "Wyndham", today };

function enrich(raw: RawRecord) {
  return enrichRecord(normalizeRecord(raw, { today }), context);
}

describe("Classifier", () => {
  describe("jurisdiction", () => {
    it("should infer VIC from state government hosts", () => {
      expect(enrich({ url: "https://business.vic.gov.au/x" }).jurisdiction).toBe("VIC");
    });

    it("should infer Commonwealth from federal portals", () => {
      expect(enrich({ url: "https://www.grants.gov.au/go/list" }).jurisdiction).toBe("Commonwealth");
    });

    it("should leave jurisdiction unset when no rule matches", () => {
      expect(enrich({ url: "https://example.org/fund" }).jurisdiction).toBeNull();
      expect(enrich({ url: "not a url" }).jurisdiction).toBeNull();
    });

    it("should let the first matching rule win", () => {
      expect(guessJurisdiction("tenders.austender.vic.gov.au", rules)).toBe("Commonwealth");
    });

    it("should not overwrite a supplied jurisdiction", () => {
      expect(enrich({ url: "https://www.grants.gov.au/x", jurisdiction: "NSW" }).jurisdiction).toBe("NSW");
    });
  });

  describe("listing type", () => {
    it("should detect tenders from the URL", () => {
      expect(enrich({ url: "https://example.org/rft-12345" }).type).toBe("tender");
    });

    it("should detect tenders from the text", () => {
      expect(guessType("", "Request for tender: cleaning services", rules)).toBe("tender");
    });

    it("should fall back to grant", () => {
      const record = enrich({
        title: "Community Grants Round 2",
        url: "https://www.wyndham.vic.gov.au/grants",
      });
      expect(record.type).toBe("grant");
    });

    it("should keep a supplied type", () => {
      expect(enrich({ type: "grant", url: "https://example.org/tender/123" }).type).toBe("grant");
    });
  });

  describe("local government area", () => {
    it("should tag listings on the council site", () => {
      expect(enrich({ url: "https://www.wyndham.vic.gov.au/grants" }).lga).toBe("Wyndham");
    });

    it("should tag listings mentioning the locality", () => {
      expect(enrich({ title: "Grants for WYNDHAM residents", url: "https://example.org" }).lga).toBe("Wyndham");
    });

    it("should not overwrite a supplied locality on the council site", () => {
      expect(enrich({ lga: "Melton", url: "https://www.wyndham.vic.gov.au/x" }).lga).toBe("Melton");
    });

    it("should leave other listings untagged", () => {
      expect(enrich({ title: "Statewide grants", url: "https://example.org" }).lga).toBeNull();
    });
  });

  describe("audience and discipline tags", () => {
    const raw = {
      title: "Community Health Grants",
      description: "Support for not-for-profit clubs delivering health programs.",
    };

    it("should add every matching tag", () => {
      const record = enrich(raw);
      expect(record.audience).toEqual(["community", "nonprofit"]);
      expect(record.discipline).toEqual(["health"]);
    });

    it("should union with supplied tags", () => {
      expect(enrich({ ...raw, audience: ["students"] }).audience).toEqual(["community", "nonprofit", "students"]);
    });

    it("should be idempotent", () => {
      const once = enrich(raw);
      const twice = enrichRecord(once, context);
      expect(twice.audience).toEqual(once.audience);
      expect(twice.discipline).toEqual(once.discipline);
      expect(twice).toEqual(once);
    });

    it("should add nothing for empty text", () => {
      const record = enrich({});
      expect(record.audience).toEqual([]);
      expect(record.discipline).toEqual([]);
      expect(record.type).toBe("grant");
      expect(record.lga).toBeNull();
    });
  });

  describe("dates", () => {
    it("should extract a close date from the description", () => {
      const record = enrich({ title: "Arts grant", description: "Applications close 28 March 2025." });
      expect(record.close_date).toBe("2025-03-28");
      expect(record.days_to_close).toBe(18);
    });

    it("should extract a close date written after the closing time", () => {
      const record = enrich({ title: "Arts grant", description: "Applications close 5pm AEST, 31 March 2025." });
      expect(record.close_date).toBe("2025-03-31");
      expect(record.days_to_close).toBe(21);
    });

    it("should keep a supplied close date", () => {
      const record = enrich({ close_date: "2025-06-30", description: "Applications close 28 March 2025." });
      expect(record.close_date).toBe("2025-06-30");
    });

    it("should leave the close date unset when none is written", () => {
      expect(enrich({ description: "Open all year" }).close_date).toBeNull();
    });

    it("should stamp last_seen only when missing", () => {
      expect(enrich({}).last_seen).toBe(today);
      expect(enrich({ last_seen: "2025-02-01" }).last_seen).toBe("2025-02-01");
    });
  });

  it("should carry unknown keys through enrichment", () => {
    expect(enrich({ portal_ref: "A-1" }).portal_ref).toBe("A-1");
  });

  it("should lower-case hosts and tolerate bad URLs", () => {
    expect(urlHost("https://WWW.Grants.GOV.au/go")).toBe("www.grants.gov.au");
    expect(urlHost("www.grants.gov.au/go")).toBe("");
  });
});
