import JSZip from 'jszip';
import { ConfigurationError } from '../errors/deck-generation.errors';
import { errorMessage } from '../errors/http-exception.mapper';
import {
  escapeXml,
  findElements,
  isRelationshipOfType,
  LayoutPlaceholder,
  NAMESPACES,
  parseAttributes,
  parseLayoutPlaceholders,
  parseRelationships,
  Relationship,
  RELATIONSHIP_TYPES,
  relationshipsXml,
  relativeTarget,
  relsPathFor,
  resolveTarget,
  SLIDE_CONTENT_TYPE,
  XML_DECLARATION,
} from './ooxml';

const CONTENT_TYPES_PATH = '[Content_Types].xml';
const ROOT_RELS_PATH = '_rels/.rels';

export class PlaceholderHandle {
  private paragraphs: string[] = [];

  constructor(
    readonly shapeId: number,
    private readonly layoutPlaceholder: LayoutPlaceholder,
  ) {}

  get idx(): number {
    return this.layoutPlaceholder.idx;
  }

  get type(): string | undefined {
    return this.layoutPlaceholder.type;
  }

  /** Replace the contents; each line becomes one paragraph. */
  setText(text: string): void {
    this.paragraphs = text.length > 0 ? text.split(/\r?\n/) : [];
  }

  setParagraphs(lines: readonly string[]): void {
    this.paragraphs = [...lines];
  }

  toXml(): string {
    const { name, phAttributes } = this.layoutPlaceholder;
    const phTag = phAttributes ? `<p:ph ${phAttributes}/>` : '<p:ph/>';
    const body = this.paragraphs.length > 0
      ? this.paragraphs.map(paragraphXml).join('')
      : '<a:p/>';

    return '<p:sp>' +
      '<p:nvSpPr>' +
      `<p:cNvPr id="${this.shapeId}" name="${escapeXml(name)}"/>` +
      '<p:cNvSpPr><a:spLocks noGrp="1"/></p:cNvSpPr>' +
      `<p:nvPr>${phTag}</p:nvPr>` +
      '</p:nvSpPr>' +
      '<p:spPr/>' +
      `<p:txBody><a:bodyPr/><a:lstStyle/>${body}</p:txBody>` +
      '</p:sp>';
  }
}

function paragraphXml(text: string): string {
  return text.length > 0 ? `<a:p><a:r><a:t>${escapeXml(text)}</a:t></a:r></a:p>` : '<a:p/>';
}

export class SlideHandle {
  readonly placeholders: PlaceholderHandle[];

  constructor(
    readonly partPath: string,
    readonly layoutPath: string,
    layoutPlaceholders: readonly LayoutPlaceholder[],
  ) {
    // Shape id 1 belongs to the shape tree itself.
    this.placeholders = layoutPlaceholders.map((placeholder, index) => new PlaceholderHandle(index + 2, placeholder));
  }

  /** The title placeholder is the one with idx 0. */
  get title(): PlaceholderHandle | undefined {
    return this.placeholder(0);
  }

  placeholder(idx: number): PlaceholderHandle | undefined {
    return this.placeholders.find((placeholder) => placeholder.idx === idx);
  }

  toXml(): string {
    const shapes = this.placeholders.map((placeholder) => placeholder.toXml()).join('');
    return XML_DECLARATION +
      `<p:sld xmlns:a="${NAMESPACES.a}" xmlns:r="${NAMESPACES.r}" xmlns:p="${NAMESPACES.p}">` +
      '<p:cSld><p:spTree>' +
      '<p:nvGrpSpPr><p:cNvPr id="1" name=""/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr>' +
      '<p:grpSpPr/>' +
      shapes +
      '</p:spTree></p:cSld>' +
      '<p:clrMapOvr><a:masterClrMapping/></p:clrMapOvr>' +
      '</p:sld>';
  }

  relationshipsXml(): string {
    return relationshipsXml([
      { id: 'rId1', type: RELATIONSHIP_TYPES.slideLayout, target: relativeTarget(this.partPath, this.layoutPath) },
    ]);
  }
}

interface PresentationParts {
  presentationPath: string;
  presentationXml: string;
  presentationRels: Relationship[];
  contentTypesXml: string;
  layoutPaths: string[];
}

/**
 * A presentation opened from a template file. Slides are appended after any
 * slides the template already has, using the layouts of its first slide master.
 */
export class PptxDocument {
  private readonly slides: SlideHandle[] = [];
  private readonly layoutCache = new Map<string, LayoutPlaceholder[]>();
  private nextSlideNumber: number;
  private nextSlideId: number;
  private nextRelationshipNumber: number;

  private constructor(
    private readonly zip: JSZip,
    private parts: PresentationParts,
  ) {
    this.nextSlideNumber = maxNumber(Object.keys(zip.files), /^ppt\/slides\/slide(\d+)\.xml$/) + 1;
    this.nextSlideId = Math.max(
      255,
      ...findElements(parts.presentationXml, 'p:sldId').map((tag) => parseInt(parseAttributes(tag).id ?? '0', 10)),
    ) + 1;
    this.nextRelationshipNumber = maxNumber(parts.presentationRels.map((rel) => rel.id), /^rId(\d+)$/) + 1;
  }

  static async open(data: Buffer | Uint8Array): Promise<PptxDocument> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(data);
    } catch (error) {
      throw new ConfigurationError(`Template is not a valid presentation archive: ${errorMessage(error)}`);
    }

    const rootRels = parseRelationships(await readPart(zip, ROOT_RELS_PATH));
    const documentRel = rootRels.find((rel) => isRelationshipOfType(rel, RELATIONSHIP_TYPES.officeDocument));
    if (!documentRel) {
      throw new ConfigurationError('Template has no main presentation part');
    }
    const presentationPath = resolveTarget('', documentRel.target);
    const presentationXml = await readPart(zip, presentationPath);
    const presentationRels = parseRelationships(await readPart(zip, relsPathFor(presentationPath)));

    const masterTag = findElements(presentationXml, 'p:sldMasterId')[0];
    const masterRel = masterTag
      ? presentationRels.find((rel) => rel.id === parseAttributes(masterTag)['r:id'])
      : undefined;
    if (!masterRel) {
      throw new ConfigurationError('Template has no slide master');
    }
    const masterPath = resolveTarget(presentationPath, masterRel.target);
    const masterXml = await readPart(zip, masterPath);
    const masterRels = parseRelationships(await readPart(zip, relsPathFor(masterPath)));

    const layoutPaths = findElements(masterXml, 'p:sldLayoutId').map((tag) => {
      const relId = parseAttributes(tag)['r:id'];
      const rel = masterRels.find((candidate) => candidate.id === relId);
      if (!rel) {
        throw new ConfigurationError(`Slide master references missing layout relationship ${relId}`);
      }
      return resolveTarget(masterPath, rel.target);
    });

    return new PptxDocument(zip, {
      presentationPath,
      presentationXml,
      presentationRels,
      contentTypesXml: await readPart(zip, CONTENT_TYPES_PATH),
      layoutPaths,
    });
  }

  get layoutCount(): number {
    return this.parts.layoutPaths.length;
  }

  get addedSlides(): readonly SlideHandle[] {
    return this.slides;
  }

  async addSlide(layoutIndex: number): Promise<SlideHandle> {
    const layoutPath = this.parts.layoutPaths[layoutIndex];
    if (!Number.isInteger(layoutIndex) || layoutPath === undefined) {
      throw new ConfigurationError(
        `Layout index ${layoutIndex} is out of range (template has ${this.layoutCount} layouts)`,
      );
    }

    const partPath = `ppt/slides/slide${this.nextSlideNumber++}.xml`;
    const relationship: Relationship = {
      id: `rId${this.nextRelationshipNumber++}`,
      type: RELATIONSHIP_TYPES.slide,
      target: relativeTarget(this.parts.presentationPath, partPath),
    };

    this.parts = {
      ...this.parts,
      presentationXml: appendSlideId(this.parts.presentationXml, this.nextSlideId++, relationship.id),
      presentationRels: [...this.parts.presentationRels, relationship],
      contentTypesXml: appendOverride(this.parts.contentTypesXml, `/${partPath}`, SLIDE_CONTENT_TYPE),
    };

    const slide = new SlideHandle(partPath, layoutPath, await this.layoutPlaceholders(layoutPath));
    this.slides.push(slide);
    return slide;
  }

  async toBuffer(): Promise<Buffer> {
    for (const slide of this.slides) {
      this.zip.file(slide.partPath, slide.toXml());
      this.zip.file(relsPathFor(slide.partPath), slide.relationshipsXml());
    }
    this.zip.file(this.parts.presentationPath, this.parts.presentationXml);
    this.zip.file(relsPathFor(this.parts.presentationPath), relationshipsXml(this.parts.presentationRels));
    this.zip.file(CONTENT_TYPES_PATH, this.parts.contentTypesXml);

    return this.zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
  }

  private async layoutPlaceholders(layoutPath: string): Promise<LayoutPlaceholder[]> {
    let placeholders = this.layoutCache.get(layoutPath);
    if (!placeholders) {
      placeholders = parseLayoutPlaceholders(await readPart(this.zip, layoutPath));
      this.layoutCache.set(layoutPath, placeholders);
    }
    return placeholders;
  }
}

async function readPart(zip: JSZip, partPath: string): Promise<string> {
  const file = zip.file(partPath);
  if (!file) {
    throw new ConfigurationError(`Template is missing part ${partPath}`);
  }
  return file.async('string');
}

function maxNumber(values: readonly string[], pattern: RegExp): number {
  return values.reduce((max, value) => {
    const match = value.match(pattern);
    return match ? Math.max(max, parseInt(match[1], 10)) : max;
  }, 0);
}

function appendSlideId(presentationXml: string, slideId: number, relId: string): string {
  const entry = `<p:sldId id="${slideId}" r:id="${relId}"/>`;

  if (/<p:sldIdLst\s*\/>/.test(presentationXml)) {
    return presentationXml.replace(/<p:sldIdLst\s*\/>/, `<p:sldIdLst>${entry}</p:sldIdLst>`);
  }
  if (presentationXml.includes('</p:sldIdLst>')) {
    return presentationXml.replace('</p:sldIdLst>', `${entry}</p:sldIdLst>`);
  }

  // sldIdLst sits right before sldSz (or notesSz when there is no sldSz).
  const anchor = presentationXml.match(/<p:(?:sldSz|notesSz)\b/);
  if (!anchor || anchor.index === undefined) {
    throw new ConfigurationError('Template presentation part has no slide list position');
  }
  return presentationXml.slice(0, anchor.index) +
    `<p:sldIdLst>${entry}</p:sldIdLst>` +
    presentationXml.slice(anchor.index);
}

function appendOverride(contentTypesXml: string, partName: string, contentType: string): string {
  if (contentTypesXml.includes(`PartName="${partName}"`)) {
    return contentTypesXml;
  }
  return contentTypesXml.replace('</Types>', `<Override PartName="${partName}" ContentType="${contentType}"/></Types>`);
}
