/**
 * CSV export writer. UTF-8 with a byte order mark so spreadsheet tools pick
 * the right encoding for accented text; CRLF line endings.
 */

import { mkdir, writeFile } from "fs/promises";
import { resolve } from "path";
import type { ExportVariant } from "../config";
import type { ExportRow } from "../export/rows";

export const CSV_COLUMNS: readonly { header: string; value: (row: ExportRow) => string | number | null }[] = [
  { header: "ticket_id", value: (r) => r.ticketId },
  { header: "subject", value: (r) => r.subject },
  { header: "status", value: (r) => r.status },
  { header: "priority", value: (r) => r.priority },
  { header: "type", value: (r) => r.type },
  { header: "tags", value: (r) => r.tags },
  { header: "created_at", value: (r) => r.createdAt },
  { header: "updated_at", value: (r) => r.updatedAt },
  { header: "requester_name", value: (r) => r.requesterName },
  { header: "requester_email", value: (r) => r.requesterEmail },
  { header: "assignee_name", value: (r) => r.assigneeName },
  { header: "assignee_email", value: (r) => r.assigneeEmail },
  { header: "comment_id", value: (r) => r.commentId },
  { header: "comment_author_name", value: (r) => r.commentAuthorName },
  { header: "comment_author_email", value: (r) => r.commentAuthorEmail },
  { header: "comment_body", value: (r) => r.commentBody },
  { header: "comment_visibility", value: (r) => r.commentVisibility },
  { header: "comment_created_at", value: (r) => r.commentCreatedAt },
  { header: "error", value: (r) => r.error },
];

const BOM = "\uFEFF";

export function escapeCsv(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return "";
  const str = String(value);
  if (/[",\r\n]/.test(str)) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/**
 * Every custom field id that has a value on at least one row, ascending.
 */
export function customFieldIds(rows: ExportRow[]): number[] {
  const ids = new Set<number>();
  for (const row of rows) {
    for (const id of row.customFields.keys()) ids.add(id);
  }
  return [...ids].sort((a, b) => a - b);
}

/**
 * Fixed columns followed by one custom_field_<id> column per field seen in
 * the run; rows without that field leave it empty.
 */
export function toCsv(rows: ExportRow[]): string {
  const fieldIds = customFieldIds(rows);
  const header = [...CSV_COLUMNS.map((c) => c.header), ...fieldIds.map((id) => `custom_field_${id}`)];
  const lines = [header.join(",")];
  for (const row of rows) {
    const fixed = CSV_COLUMNS.map((c) => escapeCsv(c.value(row)));
    const custom = fieldIds.map((id) => escapeCsv(row.customFields.get(id)));
    lines.push([...fixed, ...custom].join(","));
  }
  return lines.join("\r\n") + "\r\n";
}

export function exportFileName(label: string, variant: ExportVariant): string {
  return `zendesk_tickets_${label}_${variant}.csv`;
}

export async function writeCsvExport(
  rows: ExportRow[],
  outputDir: string,
  label: string,
  variant: ExportVariant
): Promise<string> {
  const resolvedDir = resolve(outputDir);
  await mkdir(resolvedDir, { recursive: true });

  const filePath = resolve(resolvedDir, exportFileName(label, variant));
  await writeFile(filePath, BOM + toCsv(rows), "utf-8");
  return filePath;
}
