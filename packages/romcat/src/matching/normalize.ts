/**
 * Title normalisation shared by queries and catalog entries.
 */

import type { AliasMap } from '../shared/types.js';

// CJK punctuation outside the full-width ASCII block
const CJK_PUNCT: Record<string, string> = {
  '【': '[',
  '】': ']',
  '、': ',',
  '—': '-',
  '　': ' ',
};

const META_TAG = '(?:简体|繁体|中文|汉化|英化|破解版|修正版|修复|补丁|整合|合集|典藏|完全版|年度版|豪华版|v\\d|ver\\.?\\d|beta|demo)';
const META_PAREN_RE = new RegExp(`\\((?=[^)]*${META_TAG})[^)]*\\)`, 'gi');
const META_BRACKET_RE = new RegExp(`\\[(?=[^\\]]*${META_TAG})[^\\]]*\\]`, 'gi');

const REGION_RE =
  /\s*\([^)]*\b(?:USA|Japan|Europe|China|Korea|Asia|Australia|Canada|Brazil|Mexico|France|Germany|Italy|Spain|UK|PAL|NTSC|Region|Rev|Disc|CD)\b[^)]*\)/gi;
const LANGUAGE_RE = /\s*\((?:(?:En|Fr|De|Es|It|Ja|Zh)(?:[,+]\s*)?)+\)/g;

/** Map full-width forms (！ （ ：…) and common CJK punctuation to ASCII. */
export function toHalfWidth(s: string): string {
  return s.replace(/[！-～　、【】—]/g, (ch) => {
    const mapped = CJK_PUNCT[ch];
    if (mapped !== undefined) return mapped;
    return String.fromCharCode(ch.charCodeAt(0) - 0xfee0);
  });
}

function collapse(s: string): string {
  return s.replace(/\s+/g, ' ').trim();
}

/** Drop "(USA)", "(Japan, Europe)", "(Rev 1)", "(En,Fr,De)" style suffixes. */
export function stripRegionTags(s: string): string {
  return collapse(s.replace(REGION_RE, ' ').replace(LANGUAGE_RE, ' '));
}

/**
 * Normalise a title for display-independent comparison: half-width
 * punctuation, no release/region tags, no surrounding quotes, single spaces.
 * Case is preserved; callers lower-case once aliases are applied.
 */
export function normalizeTitle(s: string): string {
  let out = collapse(toHalfWidth(s));
  out = out.replace(META_PAREN_RE, '').replace(META_BRACKET_RE, '');
  out = stripRegionTags(out);
  out = out.replace(/^[\s"'`]+|[\s"'`]+$/g, '');
  return collapse(out);
}

/** Replace a known alias (whole string first, then first substring hit) by its default title. */
export function applyAlias(s: string, aliases: AliasMap): string {
  if (aliases.size === 0) return s;
  const lower = s.toLowerCase();
  const whole = aliases.get(lower);
  if (whole !== undefined) return whole;

  for (const [alias, canonical] of aliases) {
    if (!alias) continue;
    const re = new RegExp(escapeRegExp(alias), 'i');
    if (re.test(s)) return s.replace(re, () => canonical);
  }
  return s;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
