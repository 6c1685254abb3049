import type { ZodError } from "zod";
import { POSITION_FIELD, RawAlbumCollection, type RawAlbumRecord } from "@album-insights/schemas";

import { MalformedPayloadError } from "./errors";
import { coercePosition } from "./position";
import type { AlbumTable, UploadPayload } from "./types";

const DATA_URI = /^data:([^,]*),/i;
const BASE64_BODY = /^[A-Za-z0-9+/]*={0,2}$/;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function decodeUtf8(bytes: Uint8Array): string {
  try {
    // fatal rejects invalid sequences; the default ignoreBOM drops a leading BOM
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (error) {
    throw new MalformedPayloadError("Payload is not valid UTF-8 text", { cause: error });
  }
}

function decodeBase64(body: string): Uint8Array {
  const compact = body.replace(/\s+/g, "");
  if (!BASE64_BODY.test(compact) || compact.length % 4 === 1) {
    throw new MalformedPayloadError("Payload body is not valid base64");
  }
  return Buffer.from(compact, "base64");
}

function decodePercent(body: string): string {
  try {
    return decodeURIComponent(body);
  } catch (error) {
    throw new MalformedPayloadError(`Payload body is not valid URI text: ${errorMessage(error)}`, {
      cause: error
    });
  }
}

/**
 * Strips the `data:<mime>[;base64],` envelope added by upload widgets and
 * returns the decoded text. Strings without the envelope are taken as text.
 */
export function decodePayload(payload: UploadPayload): string {
  if (typeof payload !== "string") {
    return decodeUtf8(payload);
  }

  const envelope = DATA_URI.exec(payload);
  if (!envelope) {
    return payload.replace(/^\uFEFF/, "");
  }

  const meta = envelope[1].trim();
  const body = payload.slice(envelope[0].length);
  if (/;base64$/i.test(meta)) {
    return decodeUtf8(decodeBase64(body));
  }
  return decodePercent(body).replace(/^\uFEFF/, "");
}

function describeShapeError(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue || issue.path.length === 0) {
    return "Expected a JSON array of album records";
  }
  return `Record ${String(issue.path[0])} is not a JSON object`;
}

export function parseRecords(text: string): RawAlbumRecord[] {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new MalformedPayloadError(`Invalid JSON: ${errorMessage(error)}`, { cause: error });
  }

  const result = RawAlbumCollection.safeParse(document);
  if (!result.success) {
    throw new MalformedPayloadError(describeShapeError(result.error));
  }
  return result.data;
}

export function normalizeRecords(records: readonly RawAlbumRecord[]): AlbumTable {
  return records.map((record, index) => ({
    index,
    album: record.album,
    year: record.year,
    position: coercePosition(record[POSITION_FIELD])
  }));
}

export function ingest(payload: UploadPayload): AlbumTable {
  return normalizeRecords(parseRecords(decodePayload(payload)));
}
