/**
 * Record Export
 * Deterministic ordering of mapped pages and their tabular rows
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import { PageRecord } from '../crawling/crawling.types';
import { siteSlug } from '../crawling/url-normalizer';
import { HIERARCHY_SEPARATOR, formatHierarchy } from '../hierarchy/hierarchy-display';
import { effectiveHierarchy } from '../crawling/page-record';

export const RECORD_HEADERS = [
  'De',
  'Para',
  'Tipo de migração',
  'Qtd de conteúdos',
  'Qtd de arquivos',
  'Verificar Cópias',
  'Hierarquia',
  'Visibilidade',
  'Menu Lateral',
  'Breadcrumb',
  'Vocabulário',
  'Categoria',
  'Pontos de atenção',
  'Redes sociais',
  'Tipo de página',
  'Nome da página',
  'Link de redirecionamento',
  'Complexidade',
  'Layout',
  'Data Descoberta',
] as const;

/**
 * Header occupies row 1, so the first record sits on row 2
 */
export const FIRST_DATA_ROW = 2;

export interface RowOptions {
  /**
   * Label forced at the head of the displayed hierarchy
   */
  rootLabel: string;

  /**
   * Argument separator used in spreadsheet formulas
   */
  formulaSeparator: string;
}

function sortKey(record: PageRecord, rootLabel: string): string[] {
  return record.breadcrumbHierarchy.length > 0 ? record.breadcrumbHierarchy : [rootLabel];
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Order by breadcrumb depth, then breadcrumb path element-wise, then URL
 */
export function compareRecords(a: PageRecord, b: PageRecord, rootLabel: string): number {
  const keyA = sortKey(a, rootLabel);
  const keyB = sortKey(b, rootLabel);

  if (keyA.length !== keyB.length) {
    return keyA.length - keyB.length;
  }

  for (let i = 0; i < keyA.length; i++) {
    const result = compareStrings(keyA[i], keyB[i]);
    if (result !== 0) return result;
  }

  return compareStrings(a.url, b.url);
}

/**
 * Sorted copy; the input is left untouched
 */
export function sortRecords(records: PageRecord[], rootLabel: string): PageRecord[] {
  return [...records].sort((a, b) => compareRecords(a, b, rootLabel));
}

/**
 * Spreadsheet formula flagging URLs that appear more than once in column A
 */
export function duplicateCheckFormula(rowNumber: number, separator: string): string {
  return `=SE(CONT.SE(A:A${separator}A${rowNumber})>1${separator}"Duplicado"${separator}"Único")`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as "YYYY-MM-DD HH:mm:ss"
 */
export function formatDiscoveredAt(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * One table row for a record at the given 0-based position in the sorted list
 */
export function toRow(record: PageRecord, index: number, options: RowOptions): string[] {
  const breadcrumb =
    record.breadcrumbHierarchy.length > 0
      ? record.breadcrumbHierarchy.join(HIERARCHY_SEPARATOR)
      : '-';

  return [
    record.url,
    record.targetUrl,
    record.migrationType,
    String(record.contentCount),
    String(record.fileCount),
    duplicateCheckFormula(index + FIRST_DATA_ROW, options.formulaSeparator),
    formatHierarchy(effectiveHierarchy(record), options.rootLabel),
    record.isVisible ? 'Menu' : 'Oculta',
    record.sideMenuTitle,
    breadcrumb,
    record.vocabulary,
    record.category,
    record.attentionFlag,
    record.socialNetworks,
    record.pageType,
    record.linkedPageName,
    record.redirectLink,
    record.complexity,
    record.layout,
    formatDiscoveredAt(record.discoveredAt),
  ];
}

/**
 * Rows in the given order, header excluded
 */
export function toRows(records: PageRecord[], options: RowOptions): string[][] {
  return records.map((record, index) => toRow(record, index, options));
}

/**
 * CSV text with header; row order is preserved exactly
 */
export function renderRecordsCsv(records: PageRecord[], options: RowOptions): string {
  return stringify([[...RECORD_HEADERS], ...toRows(records, options)], { bom: true });
}

/**
 * Write the CSV to filePath, creating its directory when needed
 */
export async function writeRecordsCsv(
  records: PageRecord[],
  filePath: string,
  options: RowOptions
): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, renderRecordsCsv(records, options), 'utf-8');
}

function fileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * "<outputDir>/<site-slug>_mapeamento_<YYYYMMDD_HHmmss>.csv"
 */
export function buildOutputPath(outputDir: string, siteUrl: string, date: Date = new Date()): string {
  return path.join(outputDir, `${siteSlug(siteUrl)}_mapeamento_${fileTimestamp(date)}.csv`);
}
