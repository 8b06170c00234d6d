import { ConfigurationError } from '../errors/deck-generation.errors';
import { SlideSpec } from '../types/presentation';

export const BULLET_MARKER = '-';

export type OutlineLine =
  | { kind: 'title'; text: string }
  | { kind: 'bullet'; text: string };

/** Marks end of input so the last open group gets flushed like any other. */
type OutlineToken = OutlineLine | { kind: 'end' };

interface SectionGroup {
  title?: string;
  bullets: string[];
}

export function classifyLine(line: string): OutlineLine {
  const trimmed = line.trim();
  if (trimmed.startsWith(BULLET_MARKER)) {
    return { kind: 'bullet', text: trimmed.slice(BULLET_MARKER.length).trim() };
  }
  return { kind: 'title', text: trimmed };
}

/**
 * Trimmed, non-empty lines of the outline, classified.
 */
export function tokenizeOutline(outlineText: string): OutlineLine[] {
  return outlineText
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map(classifyLine);
}

/**
 * Turn an outline into content slide specs, rotating through the given layouts.
 *
 * A section becomes a slide only once it has both a title and at least one
 * bullet; bullets before the first title and titles without bullets are dropped.
 * The cover slide is not part of the result; `title` only labels errors.
 */
export function assignSlides(
  title: string,
  outlineText: string,
  contentLayouts: readonly number[],
): SlideSpec[] {
  if (contentLayouts.length === 0) {
    throw new ConfigurationError(`No content layouts configured for deck "${title}"`);
  }

  const slides: SlideSpec[] = [];
  let group: SectionGroup = { bullets: [] };
  let cursor = 0;

  const flush = () => {
    if (group.title !== undefined && group.bullets.length > 0) {
      slides.push({
        title: group.title,
        bullets: group.bullets,
        layoutIndex: contentLayouts[cursor % contentLayouts.length],
      });
      cursor += 1;
    }
  };

  const tokens: OutlineToken[] = [...tokenizeOutline(outlineText), { kind: 'end' }];

  for (const token of tokens) {
    switch (token.kind) {
      case 'bullet':
        group.bullets.push(token.text);
        break;
      case 'title':
        flush();
        group = { title: token.text, bullets: [] };
        break;
      case 'end':
        flush();
        break;
    }
  }

  return slides;
}
