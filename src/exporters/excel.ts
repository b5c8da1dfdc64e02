// Excel Exporter - Writes a ResourceSet to a multi-sheet workbook
import ExcelJS from 'exceljs';
import { toError } from '../errors.js';
import { flattenRecords, type FlatTable } from '../flatten.js';
import { SheetNameAllocator } from '../sheet-name.js';
import type { ExcelExportOptions, ExportSummary, ResourceSet } from '../types.js';

export const DEFAULT_PLACEHOLDER_SHEET = 'inventory';
export const PLACEHOLDER_MESSAGE = 'No resources collected';

const MIN_COLUMN_WIDTH = 10;
const MAX_COLUMN_WIDTH = 60;

/**
 * ExcelExporter writes one worksheet per ResourceSet entry.
 *
 * Sheets are written best-effort: a sheet that fails is logged and left out,
 * and the workbook always ends up with at least one sheet.
 */
export class ExcelExporter {
  /**
   * Export a ResourceSet to an Excel file.
   *
   * @returns Which sheets were written and which labels failed
   */
  async export(resources: ResourceSet, options: ExcelExportOptions): Promise<ExportSummary> {
    const workbook = new ExcelJS.Workbook();
    const names = new SheetNameAllocator();
    const summary: ExportSummary = {
      outputPath: options.outputPath,
      sheets: [],
      failures: [],
      placeholder: false,
    };

    for (const [label, records] of resources) {
      const sheetName = names.allocate(label);
      try {
        const table = flattenRecords(records);
        this.addSheet(workbook, sheetName, table);
        summary.sheets.push({ label, sheetName, rows: table.rows.length, columns: table.columns.length });
      } catch (error) {
        const err = toError(error);
        console.error(`[ExcelExporter] Failed to write sheet ${label}: ${err.message}`);
        const partial = workbook.getWorksheet(sheetName);
        if (partial) {
          workbook.removeWorksheet(partial.id);
        }
        names.release(sheetName);
        summary.failures.push({ label, error: err });
      }
    }

    if (summary.sheets.length === 0) {
      const placeholder = workbook.addWorksheet(
        names.allocate(options.placeholderSheetName || DEFAULT_PLACEHOLDER_SHEET)
      );
      placeholder.getCell('A1').value = PLACEHOLDER_MESSAGE;
      summary.placeholder = true;
    }

    console.log(`[ExcelExporter] Writing inventory to ${options.outputPath}`);
    await workbook.xlsx.writeFile(options.outputPath);
    return summary;
  }

  /**
   * Add one formatted worksheet holding a flattened table.
   */
  private addSheet(workbook: ExcelJS.Workbook, sheetName: string, table: FlatTable): void {
    const worksheet = workbook.addWorksheet(sheetName);
    if (table.columns.length === 0) {
      return;
    }

    worksheet.columns = table.columns.map((header, index) => ({
      header,
      key: header,
      width: this.getColumnWidth(table, index),
    }));

    // Style header row
    const headerRow = worksheet.getRow(1);
    headerRow.font = { bold: true };
    headerRow.fill = {
      type: 'pattern',
      pattern: 'solid',
      fgColor: { argb: 'FFE0E0E0' },
    };

    for (const row of table.rows) {
      worksheet.addRow(row);
    }

    if (table.rows.length > 0) {
      worksheet.autoFilter = {
        from: { row: 1, column: 1 },
        to: { row: 1, column: table.columns.length },
      };
    }

    // Freeze header row
    worksheet.views = [{ state: 'frozen', ySplit: 1 }];
  }

  /**
   * Width fitting the longest value in a column, clamped to a readable range.
   */
  private getColumnWidth(table: FlatTable, index: number): number {
    let longest = table.columns[index].length;
    for (const row of table.rows) {
      const value = row[index];
      if (value !== null) {
        longest = Math.max(longest, String(value).length);
      }
    }
    return Math.min(MAX_COLUMN_WIDTH, Math.max(MIN_COLUMN_WIDTH, longest + 2));
  }
}
