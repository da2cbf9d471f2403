/**
 * Model response parser
 *
 * Turns the labeled-section text the model is asked to produce into an AnalysisRecord.
 * Never throws on malformed text: missing sections degrade to defaults.
 */

import {
  SECTION_HEADERS,
  PARSED_CONFIDENCE,
  DEFAULT_TRUE_MEANING,
  DEFAULT_CHILD_NEEDS,
  LIST_PLACEHOLDER,
  type SectionKey,
} from '../config/ai-constants.js';
import { MAX_LIST_ITEMS } from '../config/constants.js';
import { createAnalysisRecord } from '../domain/analysis.js';
import { detectEmotionalStates } from '../domain/emotions.js';
import type { AnalysisRecord } from '../domain/types.js';

export type Sections = Record<SectionKey, string>;

export interface ParseOptions {
  confidenceScore?: number;
  now?: () => Date;
}

const EMPTY_SECTIONS: Sections = {
  emotionalState: '',
  trueMeaning: '',
  childNeeds: '',
  suggestedResponses: '',
  whatToAvoid: '',
  safetyNotice: '',
};

function matchHeader(line: string): SectionKey | null {
  const upper = line.toUpperCase();
  const match = SECTION_HEADERS.find(({ header }) => upper.includes(header));
  return match ? match.key : null;
}

/**
 * Splits the text into sections keyed by header.
 * A header line starts an empty section, so text sharing the line with a header is dropped.
 * Lines before the first header are dropped; a repeated header overwrites the earlier section.
 */
export function extractSections(text: string): Sections {
  const sections: Sections = { ...EMPTY_SECTIONS };
  let currentKey: SectionKey | null = null;
  let buffer: string[] = [];

  const flush = () => {
    if (currentKey) {
      sections[currentKey] = buffer.join('\n').trim();
    }
  };

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;

    const key = matchHeader(line);
    if (key) {
      flush();
      currentKey = key;
      buffer = [];
    } else {
      buffer.push(line);
    }
  }

  flush();
  return sections;
}

const ENUMERATED_LINE = /^[0-9\-•]/;
const ENUMERATOR_PREFIX = /^[0-9.\-•) ]+/;

/**
 * Reads up to three list items. Bulleted or numbered lines are always taken;
 * plain lines only while fewer than three items were collected.
 */
export function parseListSection(text: string): string[] {
  const items: string[] = [];

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;

    if (ENUMERATED_LINE.test(line)) {
      const cleaned = line.replace(ENUMERATOR_PREFIX, '').trim();
      if (cleaned) {
        items.push(cleaned);
      }
    } else if (items.length < MAX_LIST_ITEMS) {
      items.push(line);
    }
  }

  return items.length > 0 ? items.slice(0, MAX_LIST_ITEMS) : [LIST_PLACEHOLDER];
}

export function parseResponse(
  rawText: string,
  originalPhrase: string,
  options: ParseOptions = {}
): AnalysisRecord {
  const sections = extractSections(rawText);

  return createAnalysisRecord({
    originalPhrase,
    emotionalStates: detectEmotionalStates(sections.emotionalState),
    trueMeaning: sections.trueMeaning || DEFAULT_TRUE_MEANING,
    childNeeds: sections.childNeeds || DEFAULT_CHILD_NEEDS,
    suggestedResponses: parseListSection(sections.suggestedResponses),
    whatToAvoid: parseListSection(sections.whatToAvoid),
    confidenceScore: options.confidenceScore ?? PARSED_CONFIDENCE,
    safetyNotice: sections.safetyNotice || undefined,
    analyzedAt: options.now ? options.now() : new Date(),
  });
}
