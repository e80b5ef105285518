import { Rule } from '../types/gateway.js';

function normalizePublicPath(path: string): string {
  return path.replace(/^\/+|\/+$/g, '');
}

/**
 * Ordered, immutable list of path-translation rules.
 * Lookup is first-match in load order.
 */
export class RuleTable {
  private readonly rules: readonly Rule[];
  private readonly byPublicPath = new Map<string, Rule>();

  constructor(entries: Rule[] = []) {
    const rules: Rule[] = [];
    for (const entry of entries) {
      const publicPath = normalizePublicPath(entry.publicPath);
      if (!publicPath) {
        throw new Error(`Rule for ${entry.upstreamTemplate} has an empty public path`);
      }
      if (this.byPublicPath.has(publicPath)) {
        throw new Error(`Duplicate rule for public path "${publicPath}"`);
      }
      const rule: Rule = Object.freeze({
        publicPath,
        upstreamTemplate: entry.upstreamTemplate,
        queryArgumentNames: Object.freeze([...entry.queryArgumentNames]),
      });
      this.byPublicPath.set(publicPath, rule);
      rules.push(rule);
    }
    this.rules = Object.freeze(rules);
  }

  /** First rule whose public path prefixes `path`, with the unmatched remainder. */
  match(path: string): { rule: Rule; remainder: string } | undefined {
    for (const rule of this.rules) {
      if (path.startsWith(rule.publicPath)) {
        return { rule, remainder: path.slice(rule.publicPath.length) };
      }
    }
    return undefined;
  }

  get(publicPath: string): Rule | undefined {
    return this.byPublicPath.get(normalizePublicPath(publicPath));
  }

  list(): readonly Rule[] {
    return this.rules;
  }
}
