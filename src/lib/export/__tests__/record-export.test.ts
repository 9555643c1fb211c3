/**
 * Record Export Tests
 */

import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  RECORD_HEADERS,
  buildOutputPath,
  compareRecords,
  duplicateCheckFormula,
  formatDiscoveredAt,
  renderRecordsCsv,
  sortRecords,
  toRow,
  toRows,
  writeRecordsCsv,
} from '../record-export';
import { createPageRecord } from '../../crawling/page-record';
import {
  AttentionFlag,
  DiscoverySource,
  PageLayout,
  PageRecord,
  PageType,
} from '../../crawling/crawling.types';

const SITE = 'Example Agency';
const BASE = 'https://www.agency.df.gov.br';
const DISCOVERED_AT = new Date(2024, 2, 5, 7, 8, 9);
const OPTIONS = { rootLabel: 'Raiz', formulaSeparator: ';' };

function page(pathname: string, breadcrumb: string[], hierarchy: string[] = [SITE, 'Page']): PageRecord {
  return createPageRecord(`${BASE}${pathname}`, hierarchy, {
    source: DiscoverySource.SITEMAP,
    breadcrumbHierarchy: breadcrumb,
    discoveredAt: DISCOVERED_AT,
  });
}

function applyPage(): PageRecord {
  const record = page('/services/apply', [SITE, 'Services', 'Apply'], [SITE, 'Services', 'Apply']);
  record.contentCount = 3;
  record.fileCount = 1;
  record.attentionFlag = AttentionFlag.HAS_FORM;
  record.layout = PageLayout.ONE_COLUMN;
  return record;
}

describe('record ordering', () => {
  const home = createPageRecord(BASE, [SITE], {
    source: DiscoverySource.HOMEPAGE,
    pageType: PageType.HOME,
  });
  const zeta = page('/zeta', [SITE, 'Zeta']);
  const alphaTwo = page('/c2', [SITE, 'Alpha']);
  const alphaOne = page('/c1', [SITE, 'Alpha']);
  const beta = page('/alpha/beta', [SITE, 'Alpha', 'Beta']);

  it('should order by depth, then path, then URL', () => {
    const sorted = sortRecords([beta, zeta, alphaTwo, home, alphaOne], SITE);

    expect(sorted.map((record) => record.url)).toEqual([
      BASE,
      `${BASE}/c1`,
      `${BASE}/c2`,
      `${BASE}/zeta`,
      `${BASE}/alpha/beta`,
    ]);
  });

  it('should be idempotent and leave the input untouched', () => {
    const input = [zeta, beta, home];
    const once = sortRecords(input, SITE);
    const twice = sortRecords(once, SITE);

    expect(twice).toEqual(once);
    expect(input.map((record) => record.url)).toEqual([`${BASE}/zeta`, `${BASE}/alpha/beta`, BASE]);
  });

  it('should treat pages without a breadcrumb as the root', () => {
    expect(compareRecords(home, zeta, SITE)).toBeLessThan(0);
    expect(compareRecords(alphaOne, alphaOne, SITE)).toBe(0);
  });
});

describe('row values', () => {
  it('should build the duplicate check formula', () => {
    expect(duplicateCheckFormula(2, ';')).toBe('=SE(CONT.SE(A:A;A2)>1;"Duplicado";"Único")');
    expect(duplicateCheckFormula(15, ',')).toBe('=SE(CONT.SE(A:A,A15)>1,"Duplicado","Único")');
  });

  it('should format discovery time in local time', () => {
    expect(formatDiscoveredAt(DISCOVERED_AT)).toBe('2024-03-05 07:08:09');
  });

  it('should fill every column in header order', () => {
    const row = toRow(applyPage(), 0, OPTIONS);

    expect(row).toHaveLength(RECORD_HEADERS.length);
    expect(row).toEqual([
      `${BASE}/services/apply`,
      '',
      'Manual',
      '3',
      '1',
      '=SE(CONT.SE(A:A;A2)>1;"Duplicado";"Único")',
      'Raiz > Services > Apply',
      'Oculta',
      '-',
      'Example Agency > Services > Apply',
      '',
      '-',
      'Página com Formulário',
      '-',
      'Página de Widget',
      '-',
      '-',
      '-',
      '1 Coluna',
      '2024-03-05 07:08:09',
    ]);
  });

  it('should show "-" for a missing breadcrumb and use the page hierarchy', () => {
    const record = page('/about', [], [SITE, 'About']);
    const row = toRow(record, 4, OPTIONS);

    expect(row[5]).toBe('=SE(CONT.SE(A:A;A6)>1;"Duplicado";"Único")');
    expect(row[6]).toBe('Raiz > About');
    expect(row[7]).toBe('Menu');
    expect(row[9]).toBe('-');
  });

  it('should number formulas by position', () => {
    const rows = toRows([page('/a', [SITE, 'A']), page('/b', [SITE, 'B'])], OPTIONS);

    expect(rows.map((row) => row[5])).toEqual([
      '=SE(CONT.SE(A:A;A2)>1;"Duplicado";"Único")',
      '=SE(CONT.SE(A:A;A3)>1;"Duplicado";"Único")',
    ]);
  });
});

describe('CSV output', () => {
  it('should write a byte order mark, the header and quoted formulas', () => {
    const lines = renderRecordsCsv([applyPage()], OPTIONS).split('\n');

    expect(lines[0]).toBe(`\ufeff${RECORD_HEADERS.join(',')}`);
    expect(lines[1]).toBe(
      `${BASE}/services/apply,,Manual,3,1,"=SE(CONT.SE(A:A;A2)>1;""Duplicado"";""Único"")",` +
        'Raiz > Services > Apply,Oculta,-,Example Agency > Services > Apply,,-,' +
        'Página com Formulário,-,Página de Widget,-,-,-,1 Coluna,2024-03-05 07:08:09'
    );
    expect(lines).toHaveLength(3);
  });

  it('should write the file, creating its directory', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'record-export-'));
    const filePath = path.join(dir, 'nested', 'out.csv');

    try {
      await writeRecordsCsv([applyPage()], filePath, OPTIONS);
      const content = await readFile(filePath, 'utf-8');
      expect(content).toBe(renderRecordsCsv([applyPage()], OPTIONS));
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('should name output files after the site and time', () => {
    expect(
      buildOutputPath('/out', 'https://www.tarf.economia.df.gov.br', new Date(2024, 0, 2, 3, 4, 5))
    ).toBe(path.join('/out', 'tarf_mapeamento_20240102_030405.csv'));
  });
});
