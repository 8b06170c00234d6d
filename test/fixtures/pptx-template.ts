import JSZip from 'jszip';
import {
  findElements,
  parseAttributes,
  parseRelationships,
  relsPathFor,
  resolveTarget,
  unescapeXml,
} from '../../src/rendering/ooxml';

export interface FixturePlaceholder {
  type?: string;
  idx?: number;
  name: string;
}

export interface FixtureLayout {
  name: string;
  placeholders: FixturePlaceholder[];
}

const NS_P = 'http://schemas.openxmlformats.org/presentationml/2006/main';
const NS_A = 'http://schemas.openxmlformats.org/drawingml/2006/main';
const NS_R = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';
const NS_REL = 'http://schemas.openxmlformats.org/package/2006/relationships';
const REL = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';

export const TITLE_ONLY: FixtureLayout = {
  name: 'Title Only',
  placeholders: [{ type: 'title', name: 'Title 1' }],
};

export const TITLE_SLIDE: FixtureLayout = {
  name: 'Title Slide',
  placeholders: [
    { type: 'ctrTitle', name: 'Title 1' },
    { type: 'subTitle', idx: 1, name: 'Subtitle 2' },
    { type: 'dt', idx: 10, name: 'Date Placeholder 3' },
  ],
};

export const TITLE_AND_CONTENT: FixtureLayout = {
  name: 'Title and Content',
  placeholders: [
    { type: 'title', name: 'Title 1' },
    { idx: 1, name: 'Content Placeholder 2' },
    { type: 'sldNum', idx: 12, name: 'Slide Number Placeholder 3' },
  ],
};

export const TWO_CONTENT: FixtureLayout = {
  name: 'Two Content',
  placeholders: [
    { type: 'title', name: 'Title 1' },
    { idx: 1, name: 'Content Placeholder 2' },
    { idx: 2, name: 'Content Placeholder 3' },
  ],
};

export const STANDARD_LAYOUTS: FixtureLayout[] = [TITLE_SLIDE, TITLE_AND_CONTENT, TWO_CONTENT, TITLE_AND_CONTENT];

function placeholderXml(placeholder: FixturePlaceholder, id: number): string {
  const attributes = [
    placeholder.type ? `type="${placeholder.type}"` : '',
    placeholder.idx !== undefined ? `idx="${placeholder.idx}"` : '',
  ].filter(Boolean).join(' ');
  return `<p:sp><p:nvSpPr><p:cNvPr id="${id}" name="${placeholder.name}"/><p:cNvSpPr><a:spLocks noGrp="1"/></p:cNvSpPr>` +
    `<p:nvPr><p:ph ${attributes}/></p:nvPr></p:nvSpPr><p:spPr/>` +
    '<p:txBody><a:bodyPr/><a:lstStyle/><a:p><a:r><a:t>Click to edit</a:t></a:r></a:p></p:txBody></p:sp>';
}

function layoutXml(layout: FixtureLayout): string {
  const shapes = layout.placeholders.map((placeholder, index) => placeholderXml(placeholder, index + 2)).join('');
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n<p:sldLayout xmlns:a="${NS_A}" xmlns:r="${NS_R}" xmlns:p="${NS_P}">` +
    `<p:cSld name="${layout.name}"><p:spTree><p:nvGrpSpPr><p:cNvPr id="1" name=""/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr>` +
    `<p:grpSpPr/>${shapes}</p:spTree></p:cSld></p:sldLayout>`;
}

function rels(entries: Array<[string, string, string]>): string {
  const items = entries.map(([id, type, target]) => `<Relationship Id="${id}" Type="${REL}/${type}" Target="${target}"/>`).join('');
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n<Relationships xmlns="${NS_REL}">${items}</Relationships>`;
}

/**
 * Build a minimal but structurally complete .pptx with one slide master and
 * the given layouts. `existingSlides` pre-populates the deck with blank slides
 * on layout 0.
 */
export async function buildTemplate(
  layouts: FixtureLayout[] = STANDARD_LAYOUTS,
  options: { existingSlides?: number } = {},
): Promise<Buffer> {
  const zip = new JSZip();
  const existing = options.existingSlides ?? 0;

  const overrides = [
    '<Override PartName="/ppt/presentation.xml" ContentType="application/vnd.openxmlformats-officedocument.presentationml.presentation.main+xml"/>',
    '<Override PartName="/ppt/slideMasters/slideMaster1.xml" ContentType="application/vnd.openxmlformats-officedocument.presentationml.slideMaster+xml"/>',
    ...layouts.map((_, index) =>
      `<Override PartName="/ppt/slideLayouts/slideLayout${index + 1}.xml" ContentType="application/vnd.openxmlformats-officedocument.presentationml.slideLayout+xml"/>`),
    ...Array.from({ length: existing }, (_, index) =>
      `<Override PartName="/ppt/slides/slide${index + 1}.xml" ContentType="application/vnd.openxmlformats-officedocument.presentationml.slide+xml"/>`),
  ].join('');
  zip.file('[Content_Types].xml',
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
    '<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>' +
    `<Default Extension="xml" ContentType="application/xml"/>${overrides}</Types>`);

  zip.file('_rels/.rels', rels([['rId1', 'officeDocument', 'ppt/presentation.xml']]));

  const slideIds = Array.from({ length: existing }, (_, index) => `<p:sldId id="${256 + index}" r:id="rId${index + 2}"/>`).join('');
  zip.file('ppt/presentation.xml',
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n<p:presentation xmlns:a="${NS_A}" xmlns:r="${NS_R}" xmlns:p="${NS_P}">` +
    '<p:sldMasterIdLst><p:sldMasterId id="2147483648" r:id="rId1"/></p:sldMasterIdLst>' +
    (existing > 0 ? `<p:sldIdLst>${slideIds}</p:sldIdLst>` : '') +
    '<p:sldSz cx="12192000" cy="6858000"/><p:notesSz cx="6858000" cy="9144000"/></p:presentation>');
  zip.file('ppt/_rels/presentation.xml.rels', rels([
    ['rId1', 'slideMaster', 'slideMasters/slideMaster1.xml'],
    ...Array.from({ length: existing }, (_, index): [string, string, string] => [`rId${index + 2}`, 'slide', `slides/slide${index + 1}.xml`]),
  ]));

  const layoutIds = layouts.map((_, index) => `<p:sldLayoutId id="${2147483649 + index}" r:id="rId${index + 1}"/>`).join('');
  zip.file('ppt/slideMasters/slideMaster1.xml',
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n<p:sldMaster xmlns:a="${NS_A}" xmlns:r="${NS_R}" xmlns:p="${NS_P}">` +
    '<p:cSld><p:spTree><p:nvGrpSpPr><p:cNvPr id="1" name=""/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr><p:grpSpPr/></p:spTree></p:cSld>' +
    `<p:sldLayoutIdLst>${layoutIds}</p:sldLayoutIdLst></p:sldMaster>`);
  zip.file('ppt/slideMasters/_rels/slideMaster1.xml.rels',
    rels(layouts.map((_, index): [string, string, string] => [`rId${index + 1}`, 'slideLayout', `../slideLayouts/slideLayout${index + 1}.xml`])));

  layouts.forEach((layout, index) => {
    zip.file(`ppt/slideLayouts/slideLayout${index + 1}.xml`, layoutXml(layout));
    zip.file(`ppt/slideLayouts/_rels/slideLayout${index + 1}.xml.rels`,
      rels([['rId1', 'slideMaster', '../slideMasters/slideMaster1.xml']]));
  });

  for (let index = 0; index < existing; index++) {
    zip.file(`ppt/slides/slide${index + 1}.xml`,
      `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n<p:sld xmlns:a="${NS_A}" xmlns:r="${NS_R}" xmlns:p="${NS_P}">` +
      '<p:cSld><p:spTree><p:nvGrpSpPr><p:cNvPr id="1" name=""/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr><p:grpSpPr/></p:spTree></p:cSld></p:sld>');
    zip.file(`ppt/slides/_rels/slide${index + 1}.xml.rels`,
      rels([['rId1', 'slideLayout', '../slideLayouts/slideLayout1.xml']]));
  }

  return zip.generateAsync({ type: 'nodebuffer' });
}

export interface RenderedSlide {
  path: string;
  layout: string;
  /** Paragraph texts keyed by placeholder idx. */
  placeholders: Record<number, string[]>;
}

/**
 * Read the slides of a generated deck in presentation order.
 */
export async function readDeck(data: Buffer): Promise<{ slides: RenderedSlide[]; zip: JSZip }> {
  const zip = await JSZip.loadAsync(data);
  const read = async (partPath: string): Promise<string> => {
    const file = zip.file(partPath);
    if (!file) {
      throw new Error(`missing part ${partPath}`);
    }
    return file.async('string');
  };

  const presentationXml = await read('ppt/presentation.xml');
  const presentationRels = parseRelationships(await read('ppt/_rels/presentation.xml.rels'));
  const slides: RenderedSlide[] = [];

  for (const tag of findElements(presentationXml, 'p:sldId')) {
    const relId = parseAttributes(tag)['r:id'];
    const rel = presentationRels.find((candidate) => candidate.id === relId);
    if (!rel) {
      throw new Error(`dangling slide relationship ${relId}`);
    }
    const slidePath = resolveTarget('ppt/presentation.xml', rel.target);
    const slideXml = await read(slidePath);
    const [layoutRel] = parseRelationships(await read(relsPathFor(slidePath)));

    const placeholders: Record<number, string[]> = {};
    for (const shape of slideXml.match(/<p:sp\b[^>]*>[\s\S]*?<\/p:sp>/g) ?? []) {
      const ph = findElements(shape, 'p:ph')[0];
      if (!ph) {
        continue;
      }
      const idx = parseInt(parseAttributes(ph).idx ?? '0', 10);
      const paragraphs = shape.match(/<a:p\/>|<a:p>[\s\S]*?<\/a:p>/g) ?? [];
      placeholders[idx] = paragraphs.map((paragraph) =>
        (paragraph.match(/<a:t>([\s\S]*?)<\/a:t>/g) ?? [])
          .map((run) => unescapeXml(run.replace(/<\/?a:t>/g, '')))
          .join(''));
    }

    slides.push({
      path: slidePath,
      layout: resolveTarget(slidePath, layoutRel.target),
      placeholders,
    });
  }

  return { slides, zip };
}
