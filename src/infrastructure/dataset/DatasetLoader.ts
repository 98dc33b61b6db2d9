/**
 * Remote dataset loader.
 *
 * Downloads a tabular dataset over HTTP and turns it into DatasetRows:
 * - CSV (by content type or `.csv` suffix), first line is the header
 * - JSON Lines (`.jsonl` / `.ndjson` or an ndjson content type)
 * - JSON array of objects otherwise
 *
 * Every record must carry a non-empty id and text under the configured
 * column names.
 */
import type { DatasetRow } from "@domain/dataset/types";
import { logEvent } from "@infrastructure/logging/Logger";
import {
  InfrastructureError,
  ValidationError,
} from "@middleware/errorHandler";
import { parse } from "csv-parse/sync";
import { z } from "zod";

export type DatasetFormat = "csv" | "json" | "jsonl";

export interface FetchDatasetOptions {
  idField?: string;
  textField?: string;
  titleField?: string;
  format?: DatasetFormat;
  fetchImpl?: typeof fetch;
}

const RecordListSchema = z.array(z.record(z.unknown()));
const IdSchema = z
  .union([z.string().trim().min(1), z.number()])
  .transform((v) => String(v));
const TextSchema = z.string().trim().min(1);

export function detectFormat(
  url: string,
  contentType: string | null
): DatasetFormat {
  const type = (contentType ?? "").toLowerCase();
  const pathname = new URL(url).pathname.toLowerCase();

  if (type.includes("csv") || pathname.endsWith(".csv")) {
    return "csv";
  }
  if (
    type.includes("ndjson") ||
    type.includes("jsonl") ||
    pathname.endsWith(".jsonl") ||
    pathname.endsWith(".ndjson")
  ) {
    return "jsonl";
  }
  return "json";
}

function parseBody(body: string, format: DatasetFormat): unknown {
  switch (format) {
    case "csv": {
      const records: unknown = parse(body, {
        columns: true,
        skip_empty_lines: true,
        bom: true,
      });
      return records;
    }
    case "jsonl":
      return body
        .split(/\r?\n/)
        .filter((line) => line.trim().length > 0)
        .map((line): unknown => JSON.parse(line));
    case "json": {
      const parsed: unknown = JSON.parse(body);
      return parsed;
    }
  }
}

export function toDatasetRows(
  records: unknown,
  fields: { idField: string; textField: string; titleField?: string }
): DatasetRow[] {
  const list = RecordListSchema.safeParse(records);
  if (!list.success) {
    throw new ValidationError("Dataset must be a list of records", {
      issues: list.error.issues,
    });
  }

  return list.data.map((record, index) => {
    const id = IdSchema.safeParse(record[fields.idField]);
    const text = TextSchema.safeParse(record[fields.textField]);

    if (!id.success || !text.success) {
      throw new ValidationError(`Dataset record ${index} is missing id or text`, {
        index,
        idField: fields.idField,
        textField: fields.textField,
      });
    }

    const row: DatasetRow = { id: id.data, text: text.data };
    const title = fields.titleField ? record[fields.titleField] : undefined;
    if (typeof title === "string" && title.trim()) {
      row.title = title.trim();
    }
    return row;
  });
}

export async function fetchDataset(
  url: string,
  options: FetchDatasetOptions = {}
): Promise<DatasetRow[]> {
  const {
    idField = "id",
    textField = "text",
    titleField,
    fetchImpl = fetch,
  } = options;

  const startedAt = Date.now();
  const response = await fetchImpl(url);

  if (!response.ok) {
    throw new InfrastructureError(
      `Dataset download failed with HTTP ${response.status}`,
      502,
      { url, status: response.status }
    );
  }

  const format =
    options.format ?? detectFormat(url, response.headers.get("content-type"));
  const body = await response.text();

  let records: unknown;
  try {
    records = parseBody(body, format);
  } catch (error: unknown) {
    throw new ValidationError(`Dataset is not valid ${format}`, {
      url,
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  const rows = toDatasetRows(records, { idField, textField, titleField });

  logEvent("DATASET_LOADED", {
    url,
    format,
    rows: rows.length,
    durationMs: Date.now() - startedAt,
  });

  return rows;
}
