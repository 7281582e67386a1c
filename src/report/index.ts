export { writeCsvExport, toCsv, escapeCsv, exportFileName, customFieldIds, CSV_COLUMNS } from "./csv";
export { formatUsageReport, type UsageReportOptions } from "./usage-report";
