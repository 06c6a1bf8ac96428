import { Injectable, Logger } from '@nestjs/common';
import JSZip from 'jszip';
import type { WorksheetModel } from '@sheetreport/shared';
import {
  CONTENT_TYPES,
  NS,
  REL_TYPES,
  chartXml,
  decodeXmlEntities,
  drawingXml,
  relationshipsXml,
  type Relationship,
} from './chart-xml';

/** Elements that must follow <drawing> inside <worksheet> */
const AFTER_DRAWING = [
  '<legacyDrawing', '<legacyDrawingHF', '<picture', '<oleObjects',
  '<controls', '<webPublishItems', '<tableParts', '<extLst',
];

function attr(tag: string, name: string): string | undefined {
  const match = tag.match(new RegExp(`\\s${name}="([^"]*)"`));
  return match?.[1] === undefined ? undefined : decodeXmlEntities(match[1]);
}

function parseRelationships(xml: string): Relationship[] {
  const tags = xml.match(/<Relationship\b[^>]*\/?>/g) ?? [];
  return tags.flatMap((tag) => {
    const id = attr(tag, 'Id');
    const type = attr(tag, 'Type');
    const target = attr(tag, 'Target');
    return id && type && target ? [{ id, type, target }] : [];
  });
}

function nextRelId(relationships: Relationship[]): string {
  const max = relationships.reduce((acc, r) => {
    const n = parseInt(r.id.replace(/^rId/, ''), 10);
    return Number.isNaN(n) ? acc : Math.max(acc, n);
  }, 0);
  return `rId${max + 1}`;
}

/**
 * Adds DrawingML chart parts to an XLSX package produced by exceljs, which
 * cannot write charts itself: one drawing per charted sheet, one chart part
 * per chart, plus the relationships and content types that link them.
 */
@Injectable()
export class ChartPartWriterService {
  private readonly logger = new Logger(ChartPartWriterService.name);

  async embedCharts(xlsx: Buffer, sheets: WorksheetModel[]): Promise<Buffer> {
    const charted = sheets.filter((s) => s.charts.length > 0);
    if (charted.length === 0) return xlsx;

    const zip = await JSZip.loadAsync(xlsx);
    const sheetPaths = await this.resolveSheetPaths(zip);
    const overrides: string[] = [];
    let drawingIdx = this.nextPartIndex(zip, /^xl\/drawings\/drawing(\d+)\.xml$/);
    let chartIdx = this.nextPartIndex(zip, /^xl\/charts\/chart(\d+)\.xml$/);

    for (const sheet of charted) {
      const sheetPath = sheetPaths.get(sheet.name);
      if (!sheetPath) {
        throw new Error(`Worksheet part for '${sheet.name}' not found in package`);
      }

      const drawingName = `drawing${drawingIdx++}.xml`;
      const chartRels: Relationship[] = sheet.charts.map((chart, i) => {
        const chartName = `chart${chartIdx++}.xml`;
        zip.file(`xl/charts/${chartName}`, chartXml(chart));
        overrides.push(`<Override PartName="/xl/charts/${chartName}" ContentType="${CONTENT_TYPES.chart}"/>`);
        return { id: `rId${i + 1}`, type: REL_TYPES.chart, target: `../charts/${chartName}` };
      });

      zip.file(`xl/drawings/${drawingName}`, drawingXml(sheet.charts));
      zip.file(`xl/drawings/_rels/${drawingName}.rels`, relationshipsXml(chartRels));
      overrides.push(`<Override PartName="/xl/drawings/${drawingName}" ContentType="${CONTENT_TYPES.drawing}"/>`);

      await this.linkDrawing(zip, sheetPath, `../drawings/${drawingName}`);
      this.logger.debug(`Embedded ${sheet.charts.length} chart(s) into ${sheetPath}`);
    }

    await this.addContentTypes(zip, overrides);
    return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
  }

  /** Sheet name → worksheet part path, via workbook.xml and its relationships */
  private async resolveSheetPaths(zip: JSZip): Promise<Map<string, string>> {
    const workbookXml = await this.readPart(zip, 'xl/workbook.xml');
    const rels = parseRelationships(await this.readPart(zip, 'xl/_rels/workbook.xml.rels'));
    const targets = new Map(rels.map((r) => [r.id, r.target]));

    const paths = new Map<string, string>();
    for (const tag of workbookXml.match(/<sheet\b[^>]*\/?>/g) ?? []) {
      const name = attr(tag, 'name');
      const relId = attr(tag, 'r:id');
      const target = relId ? targets.get(relId) : undefined;
      if (name === undefined || !target) continue;
      paths.set(name, target.startsWith('/') ? target.slice(1) : `xl/${target}`);
    }
    return paths;
  }

  private async linkDrawing(zip: JSZip, sheetPath: string, drawingTarget: string): Promise<void> {
    const slash = sheetPath.lastIndexOf('/');
    const relsPath = `${sheetPath.slice(0, slash)}/_rels/${sheetPath.slice(slash + 1)}.rels`;
    const relsFile = zip.file(relsPath);
    const rels = relsFile ? parseRelationships(await relsFile.async('string')) : [];
    const relId = nextRelId(rels);
    rels.push({ id: relId, type: REL_TYPES.drawing, target: drawingTarget });
    zip.file(relsPath, relationshipsXml(rels));

    let sheetXml = await this.readPart(zip, sheetPath);
    if (!/<worksheet\b[^>]*\sxmlns:r="/.test(sheetXml)) {
      sheetXml = sheetXml.replace(/<worksheet\b/, `<worksheet xmlns:r="${NS.relationships}"`);
    }
    const drawingTag = `<drawing r:id="${relId}"/>`;
    const insertAt = AFTER_DRAWING
      .map((tag) => sheetXml.indexOf(tag))
      .filter((idx) => idx !== -1)
      .reduce((min, idx) => Math.min(min, idx), sheetXml.lastIndexOf('</worksheet>'));
    zip.file(sheetPath, `${sheetXml.slice(0, insertAt)}${drawingTag}${sheetXml.slice(insertAt)}`);
  }

  private async addContentTypes(zip: JSZip, overrides: string[]): Promise<void> {
    const xml = await this.readPart(zip, '[Content_Types].xml');
    zip.file('[Content_Types].xml', xml.replace('</Types>', `${overrides.join('')}</Types>`));
  }

  private nextPartIndex(zip: JSZip, pattern: RegExp): number {
    let max = 0;
    zip.forEach((relativePath) => {
      const match = relativePath.match(pattern);
      if (match?.[1]) max = Math.max(max, parseInt(match[1], 10));
    });
    return max + 1;
  }

  private async readPart(zip: JSZip, partPath: string): Promise<string> {
    const file = zip.file(partPath);
    if (!file) {
      throw new Error(`Package part ${partPath} is missing`);
    }
    return file.async('string');
  }
}
