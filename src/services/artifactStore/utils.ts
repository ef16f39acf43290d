import { stringify } from 'csv-stringify/sync';
import type { NormalizedRow } from '../../types/collection.js';

/**
 * 汇总所有行的列名，按首次出现顺序排列。
 */
export function collectColumns(rows: ReadonlyArray<NormalizedRow>): string[] {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  return columns;
}

/**
 * 将规范化记录渲染为 CSV（含表头）。
 * 缺失列与 null 写为空单元格，布尔值写为 True/False。
 */
export function renderCsv(rows: ReadonlyArray<NormalizedRow>): string {
  return stringify([...rows], {
    header: true,
    columns: collectColumns(rows),
    cast: {
      boolean: (value: boolean) => (value ? 'True' : 'False'),
    },
  });
}

/**
 * 判断是否为「文件已存在」错误。
 */
export function isFileExistsError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EEXIST';
}
