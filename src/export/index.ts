export { CsvExporter, toCsv, escapeCsv } from './csv';
