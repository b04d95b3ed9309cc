export type OutputFormat = 'xlsx' | 'csv';

export const OUTPUT_MIME_TYPES: Record<OutputFormat, string> = {
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  csv: 'text/csv',
};
