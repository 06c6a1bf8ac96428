import type { ChartSpec } from '@sheetreport/shared';
import { CHART_DEFAULTS, buildAbsoluteRange, buildAbsoluteRef, parseCellRef } from '@sheetreport/shared';

export const NS = {
  chart: 'http://schemas.openxmlformats.org/drawingml/2006/chart',
  drawingMain: 'http://schemas.openxmlformats.org/drawingml/2006/main',
  spreadsheetDrawing: 'http://schemas.openxmlformats.org/drawingml/2006/spreadsheetDrawing',
  relationships: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships',
  packageRelationships: 'http://schemas.openxmlformats.org/package/2006/relationships',
} as const;

export const REL_TYPES = {
  drawing: `${NS.relationships}/drawing`,
  chart: `${NS.relationships}/chart`,
} as const;

export const CONTENT_TYPES = {
  drawing: 'application/vnd.openxmlformats-officedocument.drawing+xml',
  chart: 'application/vnd.openxmlformats-officedocument.drawingml.chart+xml',
} as const;

const XML_HEADER = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';

const CAT_AXIS_ID = 50010;
const VAL_AXIS_ID = 50020;

export function encodeXmlText(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function decodeXmlEntities(value: string): string {
  return value
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, '&');
}

export interface Relationship {
  id: string;
  type: string;
  target: string;
}

export function relationshipsXml(relationships: Relationship[]): string {
  const items = relationships
    .map((r) => `<Relationship Id="${r.id}" Type="${r.type}" Target="${encodeXmlText(r.target)}"/>`)
    .join('');
  return `${XML_HEADER}<Relationships xmlns="${NS.packageRelationships}">${items}</Relationships>`;
}

/**
 * Series of a chart. With two or more source columns the first column holds
 * the categories and each further column is a series; a single column is
 * one series without categories. The first source row is the series title.
 */
export function chartSeriesXml(chart: ChartSpec): string {
  const { sheetName, startCol, endCol, startRow, endRow } = chart.source;
  const firstValueRow = startRow + 1;
  const hasCategories = endCol > startCol;
  const valueCols: number[] = [];
  for (let col = hasCategories ? startCol + 1 : startCol; col <= endCol; col++) {
    valueCols.push(col);
  }

  const cat = hasCategories
    ? `<c:cat><c:strRef><c:f>${encodeXmlText(buildAbsoluteRange(sheetName, startCol, firstValueRow, startCol, endRow))}</c:f></c:strRef></c:cat>`
    : '';

  return valueCols
    .map((col, i) => {
      const title = buildAbsoluteRef(sheetName, col, startRow);
      const values = buildAbsoluteRange(sheetName, col, firstValueRow, col, endRow);
      const marker = chart.kind === 'line' ? '<c:marker><c:symbol val="none"/></c:marker>' : '';
      const smooth = chart.kind === 'line' ? '<c:smooth val="0"/>' : '';
      return (
        `<c:ser><c:idx val="${i}"/><c:order val="${i}"/>` +
        `<c:tx><c:strRef><c:f>${encodeXmlText(title)}</c:f></c:strRef></c:tx>` +
        marker +
        cat +
        `<c:val><c:numRef><c:f>${encodeXmlText(values)}</c:f></c:numRef></c:val>` +
        smooth +
        '</c:ser>'
      );
    })
    .join('');
}

export function chartXml(chart: ChartSpec): string {
  const series = chartSeriesXml(chart);
  const axisIds = `<c:axId val="${CAT_AXIS_ID}"/><c:axId val="${VAL_AXIS_ID}"/>`;
  const plot = chart.kind === 'bar'
    ? `<c:barChart><c:barDir val="col"/><c:grouping val="clustered"/><c:varyColors val="0"/>${series}${axisIds}</c:barChart>`
    : `<c:lineChart><c:grouping val="standard"/><c:varyColors val="0"/>${series}<c:marker val="1"/>${axisIds}</c:lineChart>`;

  return (
    `${XML_HEADER}<c:chartSpace xmlns:c="${NS.chart}" xmlns:a="${NS.drawingMain}" xmlns:r="${NS.relationships}">` +
    `<c:roundedCorners val="0"/><c:style val="${chart.style}"/>` +
    '<c:chart>' +
    `<c:title><c:tx><c:rich><a:bodyPr/><a:p><a:r><a:t>${encodeXmlText(chart.title)}</a:t></a:r></a:p></c:rich></c:tx><c:overlay val="0"/></c:title>` +
    '<c:autoTitleDeleted val="0"/>' +
    `<c:plotArea><c:layout/>${plot}` +
    `<c:catAx><c:axId val="${CAT_AXIS_ID}"/><c:scaling><c:orientation val="minMax"/></c:scaling><c:delete val="0"/><c:axPos val="b"/><c:crossAx val="${VAL_AXIS_ID}"/></c:catAx>` +
    `<c:valAx><c:axId val="${VAL_AXIS_ID}"/><c:scaling><c:orientation val="minMax"/></c:scaling><c:delete val="0"/><c:axPos val="l"/><c:majorGridlines/><c:crossAx val="${CAT_AXIS_ID}"/></c:valAx>` +
    '</c:plotArea>' +
    '<c:legend><c:legendPos val="r"/><c:overlay val="0"/></c:legend><c:plotVisOnly val="1"/>' +
    '</c:chart></c:chartSpace>'
  );
}

/** One anchored graphic frame per chart; relationship ids are rId1..rIdN in order */
export function drawingXml(charts: ChartSpec[]): string {
  const anchors = charts
    .map((chart, i) => {
      const { col, row } = parseCellRef(chart.anchor);
      const frameId = i + 2;
      return (
        '<xdr:twoCellAnchor>' +
        `<xdr:from><xdr:col>${col}</xdr:col><xdr:colOff>0</xdr:colOff><xdr:row>${row}</xdr:row><xdr:rowOff>0</xdr:rowOff></xdr:from>` +
        `<xdr:to><xdr:col>${col + CHART_DEFAULTS.WIDTH_COLS}</xdr:col><xdr:colOff>0</xdr:colOff><xdr:row>${row + CHART_DEFAULTS.HEIGHT_ROWS}</xdr:row><xdr:rowOff>0</xdr:rowOff></xdr:to>` +
        '<xdr:graphicFrame macro="">' +
        `<xdr:nvGraphicFramePr><xdr:cNvPr id="${frameId}" name="Chart ${i + 1}"/><xdr:cNvGraphicFramePr/></xdr:nvGraphicFramePr>` +
        '<xdr:xfrm><a:off x="0" y="0"/><a:ext cx="0" cy="0"/></xdr:xfrm>' +
        `<a:graphic><a:graphicData uri="${NS.chart}"><c:chart xmlns:c="${NS.chart}" xmlns:r="${NS.relationships}" r:id="rId${i + 1}"/></a:graphicData></a:graphic>` +
        '</xdr:graphicFrame><xdr:clientData/>' +
        '</xdr:twoCellAnchor>'
      );
    })
    .join('');

  return `${XML_HEADER}<xdr:wsDr xmlns:xdr="${NS.spreadsheetDrawing}" xmlns:a="${NS.drawingMain}">${anchors}</xdr:wsDr>`;
}
