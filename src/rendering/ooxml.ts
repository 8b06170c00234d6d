import path from 'node:path';

export const NAMESPACES = {
  a: 'http://schemas.openxmlformats.org/drawingml/2006/main',
  r: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships',
  p: 'http://schemas.openxmlformats.org/presentationml/2006/main',
  relationships: 'http://schemas.openxmlformats.org/package/2006/relationships',
} as const;

export const RELATIONSHIP_TYPES = {
  officeDocument: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument',
  slide: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/slide',
  slideLayout: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/slideLayout',
  slideMaster: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/slideMaster',
} as const;

export const SLIDE_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.presentationml.slide+xml';

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';

export interface Relationship {
  id: string;
  type: string;
  target: string;
  targetMode?: string;
}

export interface LayoutPlaceholder {
  idx: number;
  type?: string;
  name: string;
  /** Raw attribute text of the layout's `<p:ph>` element, copied onto the slide. */
  phAttributes: string;
}

// Footer-style placeholders are inherited from the layout, not copied onto slides.
const NON_CLONED_PLACEHOLDERS = new Set(['dt', 'ftr', 'sldNum']);

const INVALID_XML_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g;

export function escapeXml(text: string): string {
  return text
    .replace(INVALID_XML_CHARS, '')
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function unescapeXml(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, '&');
}

export function parseAttributes(tag: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  const pattern = /([\w:.-]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(tag)) !== null) {
    attributes[match[1]] = unescapeXml(match[2] ?? match[3] ?? '');
  }
  return attributes;
}

export function findElements(xml: string, qualifiedName: string): string[] {
  const escaped = qualifiedName.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return xml.match(new RegExp(`<${escaped}\\b[^>]*>`, 'g')) ?? [];
}

export function parseRelationships(xml: string): Relationship[] {
  return findElements(xml, 'Relationship').map((tag) => {
    const attributes = parseAttributes(tag);
    return {
      id: attributes.Id ?? '',
      type: attributes.Type ?? '',
      target: attributes.Target ?? '',
      targetMode: attributes.TargetMode,
    };
  });
}

/** Transitional and strict relationship URIs share the final path segment. */
export function isRelationshipOfType(relationship: Relationship, type: string): boolean {
  const suffix = type.slice(type.lastIndexOf('/'));
  return relationship.type.endsWith(suffix);
}

export function relsPathFor(partPath: string): string {
  return path.posix.join(path.posix.dirname(partPath), '_rels', `${path.posix.basename(partPath)}.rels`);
}

export function resolveTarget(sourcePart: string, target: string): string {
  if (target.startsWith('/')) {
    return target.slice(1);
  }
  return path.posix.normalize(path.posix.join(path.posix.dirname(sourcePart), target));
}

export function relativeTarget(sourcePart: string, targetPart: string): string {
  return path.posix.relative(path.posix.dirname(sourcePart), targetPart);
}

export function relationshipsXml(relationships: readonly Relationship[]): string {
  const items = relationships
    .map((rel) => {
      const mode = rel.targetMode ? ` TargetMode="${escapeXml(rel.targetMode)}"` : '';
      return `<Relationship Id="${escapeXml(rel.id)}" Type="${escapeXml(rel.type)}" Target="${escapeXml(rel.target)}"${mode}/>`;
    })
    .join('');
  return `${XML_DECLARATION}<Relationships xmlns="${NAMESPACES.relationships}">${items}</Relationships>`;
}

/**
 * Placeholders a new slide based on this layout should carry, in document order.
 */
export function parseLayoutPlaceholders(layoutXml: string): LayoutPlaceholder[] {
  const shapes = layoutXml.match(/<p:sp\b[^>]*>[\s\S]*?<\/p:sp>/g) ?? [];
  const placeholders: LayoutPlaceholder[] = [];

  for (const shape of shapes) {
    const phMatch = shape.match(/<p:ph\b([^>]*?)\/?>/);
    if (!phMatch) {
      continue;
    }
    const phAttributes = phMatch[1].trim();
    const attributes = parseAttributes(phAttributes);
    if (attributes.type && NON_CLONED_PLACEHOLDERS.has(attributes.type)) {
      continue;
    }
    const nameTag = findElements(shape, 'p:cNvPr')[0];
    placeholders.push({
      idx: attributes.idx ? parseInt(attributes.idx, 10) : 0,
      type: attributes.type,
      name: nameTag ? parseAttributes(nameTag).name ?? '' : '',
      phAttributes,
    });
  }

  return placeholders;
}
