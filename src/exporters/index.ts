// Exporters module entry point
export { ExcelExporter, DEFAULT_PLACEHOLDER_SHEET, PLACEHOLDER_MESSAGE } from './excel.js';
