import { BULLET_MARKER } from '../outline/outline-parser';

export function buildTitlePrompt(keyword: string): string {
  return [
    'Write a short, engaging presentation title for the following topic.',
    `Topic: ${keyword}`,
    'Output only the title text, with no explanation.',
  ].join('\n');
}

/**
 * The format requested here is exactly what the outline parser reads back.
 */
export function buildOutlinePrompt(keyword: string): string {
  return [
    `Create a presentation outline for the topic "${keyword}".`,
    'Requirements:',
    '- 3 to 5 sections, each with a title line and 2 to 4 key points',
    '- leave one blank line between sections',
    `- start every key point with '${BULLET_MARKER} '; never start a section title with it`,
    '- no numbering, no markdown, no extra commentary',
    '',
    'Example:',
    'Section title 1',
    `${BULLET_MARKER} Key point 1`,
    `${BULLET_MARKER} Key point 2`,
    '',
    'Section title 2',
    `${BULLET_MARKER} Key point 1`,
    `${BULLET_MARKER} Key point 2`,
    '',
    'Follow this format strictly so the outline can be parsed.',
  ].join('\n');
}
