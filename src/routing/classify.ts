import type { Routing } from './table.js';

export type Classification =
  | { kind: 'department'; departmentCode: string; summary: string; description: string }
  | {
      kind: 'partner';
      /** Department hashtags found anywhere in the text, in order of first appearance. */
      departmentCodes: string[];
      partnerId: string | null;
      summary: string;
      description: string;
    }
  | { kind: 'rejected'; reason: 'not-privileged' }
  | { kind: 'malformed' }
  | { kind: 'ignored' };

const ISSUE_KEY = /[A-Z]+-\d+/;

// A hashtag only counts as a whole token: `#hr` must not match inside `#hrteam`.
const TOKEN_END = '(?![\\p{L}\\p{N}_])';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function extractIssueKey(text: string | null | undefined): string | null {
  if (!text) return null;
  return text.match(ISSUE_KEY)?.[0] ?? null;
}

export function extractPartnerId(text: string, routing: Routing): string | null {
  return routing.partners.idPattern.exec(text)?.[1] ?? null;
}

/** First line is the summary, the rest is the description. */
export function splitSummary(text: string): { summary: string; description: string } {
  const newline = text.indexOf('\n');
  if (newline < 0) return { summary: text.trim(), description: '' };
  return {
    summary: text.slice(0, newline).trim(),
    description: text.slice(newline + 1).trim(),
  };
}

function hashtagsByLength(routing: Routing): string[] {
  return [...routing.hashtags.keys()].sort((a, b) => b.length - a.length);
}

function matchLeadingHashtag(
  text: string,
  routing: Routing
): { departmentCode: string; rest: string } | null {
  for (const tag of hashtagsByLength(routing)) {
    const match = new RegExp(`^${escapeRegExp(tag)}(?=\\s|$)`, 'iu').exec(text);
    if (!match) continue;
    const departmentCode = routing.hashtags.get(tag);
    if (!departmentCode) continue;
    return { departmentCode, rest: text.slice(match[0].length) };
  }
  return null;
}

function findDepartmentCodes(text: string, routing: Routing): string[] {
  const firstSeen = new Map<string, number>();
  for (const [tag, code] of routing.hashtags) {
    const match = new RegExp(`${escapeRegExp(tag)}${TOKEN_END}`, 'iu').exec(text);
    if (!match) continue;
    const seen = firstSeen.get(code);
    if (seen === undefined || match.index < seen) firstSeen.set(code, match.index);
  }
  return [...firstSeen.entries()].sort((a, b) => a[1] - b[1]).map(([code]) => code);
}

function stripRoutingTokens(text: string, routing: Routing): string {
  let result = text;
  for (const tag of hashtagsByLength(routing)) {
    result = result.replace(new RegExp(`${escapeRegExp(tag)}${TOKEN_END}[ \\t]*`, 'giu'), '');
  }
  result = result.replace(new RegExp(`${escapeRegExp(routing.taskMarker)}[ \\t]*`, 'giu'), '');
  result = result.replace(new RegExp(`${routing.partners.idPattern.source}[ \\t]*`, 'gi'), '');
  return result.replace(/[ \t]+/g, ' ').trim();
}

/**
 * Decides what an inbound chat message asks for. Reply-comments are resolved
 * before this is called.
 */
export function classifyMessage(rawText: string, senderIsPrivileged: boolean, routing: Routing): Classification {
  const text = rawText.trim();
  if (!text) return { kind: 'ignored' };

  const leading = matchLeadingHashtag(text, routing);
  if (leading) {
    const { summary, description } = splitSummary(leading.rest.trim());
    if (summary) {
      return { kind: 'department', departmentCode: leading.departmentCode, summary, description };
    }
  }

  const hasMarker = text.toLowerCase().includes(routing.taskMarker.toLowerCase());
  if (!hasMarker) return { kind: 'ignored' };
  if (!senderIsPrivileged) return { kind: 'rejected', reason: 'not-privileged' };

  const { summary, description } = splitSummary(stripRoutingTokens(text, routing));
  if (!summary) return { kind: 'malformed' };

  return {
    kind: 'partner',
    departmentCodes: findDepartmentCodes(text, routing),
    partnerId: extractPartnerId(text, routing),
    summary,
    description,
  };
}
