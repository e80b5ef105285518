import { RuleTable } from '../data/ruleTable.js';
import { BadRequestError, MissingArgumentError, SuperfluousArgumentError } from '../errors/index.js';
import { Translation } from '../types/gateway.js';

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new BadRequestError(`Malformed path segment ${JSON.stringify(segment)}`);
  }
}

/**
 * Maps a public path (relative to `/v1/`) onto an upstream URL.
 *
 * Returns `undefined` when no rule matches so the caller can fall through to
 * other routes. Throws {@link MissingArgumentError} / {@link SuperfluousArgumentError}
 * when the segment count does not match the rule's query arguments.
 */
export function translatePath(rules: RuleTable, path: string): Translation | undefined {
  const match = rules.match(path.replace(/^\/+/, ''));
  if (!match) return undefined;

  const { rule, remainder } = match;
  const segments = remainder.split('/').filter((part) => part !== '');
  const names = rule.queryArgumentNames;

  if (segments.length < names.length) {
    throw new MissingArgumentError(names[segments.length]);
  }
  if (segments.length > names.length) {
    throw new SuperfluousArgumentError(segments[names.length]);
  }

  const upstreamUrl = new URL(rule.upstreamTemplate);
  names.forEach((name, index) => {
    upstreamUrl.searchParams.append(name, decodeSegment(segments[index]));
  });

  return { rule, upstreamUrl, statisticsKey: segments.join(':') };
}
