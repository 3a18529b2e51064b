import { readFileSync } from "node:fs";
import { z } from "zod";

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern, "i");
    return true;
  } catch {
    return false;
  }
}

const Pattern = z.string().min(1).refine(isValidPattern, { message: "Invalid regular expression" });

const TagRuleSchema = z.object({
  tag: z.string().min(1),
  pattern: Pattern,
});

const JurisdictionRuleSchema = z.object({
  match: z.enum(["contains", "suffix"]),
  value: z.string().min(1),
  jurisdiction: z.string().min(1),
});

/**
 * On-disk rule tables. List order is evaluation order.
 */
export const RulesFile = z.object({
  audience: z.array(TagRuleSchema).default([]),
  discipline: z.array(TagRuleSchema).default([]),
  jurisdictions: z.array(JurisdictionRuleSchema).default([]),
  tender: z.object({
    url: Pattern,
    text: Pattern,
  }),
  councilHosts: z.array(z.string().min(1)).default([]),
});

export type RulesFile = z.infer<typeof RulesFile>;

export interface TagRule {
  tag: string;
  pattern: RegExp;
}

export type JurisdictionRule = z.infer<typeof JurisdictionRuleSchema>;

export interface ClassifierRules {
  audience: TagRule[];
  discipline: TagRule[];
  /** Evaluated in order against the URL host; first match wins. */
  jurisdictions: JurisdictionRule[];
  tender: { url: RegExp; text: RegExp };
  /** Host fragments of the local council's own site. */
  councilHosts: string[];
}

/**
 * Compile validated rule tables. All patterns match case-insensitively.
 */
export function compileRules(file: RulesFile): ClassifierRules {
  const compileTags = (rules: RulesFile["audience"]): TagRule[] =>
    rules.map((rule) => ({ tag: rule.tag, pattern: new RegExp(rule.pattern, "i") }));

  return {
    audience: compileTags(file.audience),
    discipline: compileTags(file.discipline),
    jurisdictions: file.jurisdictions,
    tender: {
      url: new RegExp(file.tender.url, "i"),
      text: new RegExp(file.tender.text, "i"),
    },
    councilHosts: file.councilHosts.map((host) => host.toLowerCase()),
  };
}

/**
 * Read, validate and compile a rules JSON file. Fails fast with the offending path.
 */
export function loadRules(filePath: string): ClassifierRules {
  let content: unknown;
  try {
    content = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to read rules file ${filePath}: ${message}`);
  }

  const parsed = RulesFile.safeParse(content);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid rules file ${filePath}: ${issues}`);
  }

  return compileRules(parsed.data);
}
