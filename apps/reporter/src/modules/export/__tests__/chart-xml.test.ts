import { describe, it, expect } from 'vitest';
import type { ChartSpec } from '@sheetreport/shared';
import {
  chartSeriesXml,
  chartXml,
  decodeXmlEntities,
  drawingXml,
  encodeXmlText,
  relationshipsXml,
} from '../chart-xml';

function chart(overrides: Partial<ChartSpec> = {}): ChartSpec {
  return {
    kind: 'bar',
    title: 'Sales by region',
    source: { sheetName: 'Sales', startCol: 0, endCol: 1, startRow: 0, endRow: 2 },
    anchor: 'E2',
    titlesFromData: true,
    style: 10,
    ...overrides,
  };
}

describe('XML text encoding', () => {
  it('escapes markup characters', () => {
    expect(encodeXmlText(`R&D <"Q1"> 'x'`)).toBe('R&amp;D &lt;&quot;Q1&quot;&gt; &apos;x&apos;');
  });

  it('decodes what it encodes', () => {
    const text = `R&D <"Q1"> 'x' &amp;`;
    expect(decodeXmlEntities(encodeXmlText(text))).toBe(text);
  });
});

describe('relationshipsXml', () => {
  it('lists each relationship', () => {
    const xml = relationshipsXml([{ id: 'rId1', type: 'urn:type', target: '../charts/chart1.xml' }]);
    expect(xml).toContain('<Relationship Id="rId1" Type="urn:type" Target="../charts/chart1.xml"/>');
    expect(xml.endsWith('</Relationships>')).toBe(true);
  });
});

describe('chartSeriesXml', () => {
  it('uses the first column as categories and the first row as the series title', () => {
    expect(chartSeriesXml(chart())).toBe(
      '<c:ser><c:idx val="0"/><c:order val="0"/>'
      + '<c:tx><c:strRef><c:f>&apos;Sales&apos;!$B$1</c:f></c:strRef></c:tx>'
      + '<c:cat><c:strRef><c:f>&apos;Sales&apos;!$A$2:$A$3</c:f></c:strRef></c:cat>'
      + '<c:val><c:numRef><c:f>&apos;Sales&apos;!$B$2:$B$3</c:f></c:numRef></c:val>'
      + '</c:ser>',
    );
  });

  it('emits one series per value column', () => {
    const xml = chartSeriesXml(chart({
      source: { sheetName: 'Sales', startCol: 0, endCol: 2, startRow: 0, endRow: 4 },
    }));
    expect(xml.match(/<c:ser>/g)).toHaveLength(2);
    expect(xml).toContain('<c:f>&apos;Sales&apos;!$C$2:$C$5</c:f>');
  });

  it('has no categories for a single column', () => {
    const xml = chartSeriesXml(chart({
      source: { sheetName: 'Sales', startCol: 1, endCol: 1, startRow: 0, endRow: 2 },
    }));
    expect(xml).not.toContain('<c:cat>');
    expect(xml).toContain('<c:f>&apos;Sales&apos;!$B$2:$B$3</c:f>');
  });

  it('escapes quotes in sheet names', () => {
    const xml = chartSeriesXml(chart({
      source: { sheetName: "Bob's", startCol: 0, endCol: 1, startRow: 0, endRow: 1 },
    }));
    expect(xml).toContain('<c:f>&apos;Bob&apos;&apos;s&apos;!$B$1</c:f>');
  });
});

describe('chartXml', () => {
  it('renders a clustered column chart for bar', () => {
    const xml = chartXml(chart());
    expect(xml).toContain('<c:barChart><c:barDir val="col"/><c:grouping val="clustered"/>');
    expect(xml).toContain('<c:style val="10"/>');
    expect(xml).toContain('<a:t>Sales by region</a:t>');
  });

  it('renders a line chart for line', () => {
    const xml = chartXml(chart({ kind: 'line', title: 'P&L' }));
    expect(xml).toContain('<c:lineChart>');
    expect(xml).not.toContain('<c:barChart>');
    expect(xml).toContain('<a:t>P&amp;L</a:t>');
  });
});

describe('drawingXml', () => {
  it('anchors each chart at its cell and links it by position', () => {
    const xml = drawingXml([chart(), chart({ anchor: 'A20' })]);
    expect(xml).toContain(
      '<xdr:from><xdr:col>4</xdr:col><xdr:colOff>0</xdr:colOff><xdr:row>1</xdr:row><xdr:rowOff>0</xdr:rowOff></xdr:from>',
    );
    expect(xml).toContain(
      '<xdr:to><xdr:col>12</xdr:col><xdr:colOff>0</xdr:colOff><xdr:row>16</xdr:row><xdr:rowOff>0</xdr:rowOff></xdr:to>',
    );
    expect(xml).toContain('r:id="rId1"');
    expect(xml).toContain('r:id="rId2"');
    expect(xml).toContain('<xdr:row>19</xdr:row>');
  });
});
