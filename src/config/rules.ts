import { readFileSync } from 'fs';
import { z } from 'zod';
import { RuleTable } from '../data/ruleTable.js';
import { Rule } from '../types/gateway.js';

const ruleFileSchema = z.object({
  'public-path': z.string().trim().min(1),
  'upstream-template': z.string().url(),
  'query-arguments': z.array(z.string().min(1)),
});

export function parseRule(raw: unknown): Rule {
  const parsed = ruleFileSchema.parse(raw);
  return {
    publicPath: parsed['public-path'],
    upstreamTemplate: parsed['upstream-template'],
    queryArgumentNames: parsed['query-arguments'],
  };
}

/** Reads each rule file in order; any unreadable or malformed file aborts the load. */
export function loadRuleTable(paths: readonly string[], read = (path: string) => readFileSync(path, 'utf8')): RuleTable {
  const rules = paths.map((path) => {
    try {
      return parseRule(JSON.parse(read(path)));
    } catch (error) {
      const reason = error instanceof z.ZodError
        ? error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ')
        : error instanceof Error ? error.message : String(error);
      throw new Error(`Could not load rule file ${path}: ${reason}`);
    }
  });
  return new RuleTable(rules);
}
