/**
 * Bulk operation reports
 *
 * Swift answers bulk deletes and archive extraction with a report of the
 * overall status plus one entry per failed item, in JSON or XML depending on
 * the Accept header.
 */

import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { BulkError, BulkObjectError, MalformedResponseError } from '../errors/index.js';

export interface BulkReport {
  /** Overall status code, from "Response Status" */
  statusCode: number;
  /** Error concerning the whole request ("Response Body"), or '' */
  archiveError: string;
  objectErrors: BulkObjectError[];
  numberDeleted: number;
  numberNotFound: number;
  numberFilesCreated: number;
}

const JsonReportSchema = z.object({
  'Response Status': z.string(),
  'Response Body': z.string().default(''),
  Errors: z.array(z.tuple([z.string(), z.union([z.string(), z.number()])])).default([]),
  'Number Deleted': z.number().int().nonnegative().default(0),
  'Number Not Found': z.number().int().nonnegative().default(0),
  'Number Files Created': z.number().int().nonnegative().default(0),
});

const XmlObjectSchema = z.object({
  name: z.string(),
  status: z.string(),
});

const XmlReportSchema = z.object({
  response_status: z.string(),
  response_body: z.string().default(''),
  errors: z
    .union([z.literal(''), z.object({ object: z.array(XmlObjectSchema).default([]) })])
    .default(''),
  number_deleted: z.coerce.number().int().nonnegative().default(0),
  number_not_found: z.coerce.number().int().nonnegative().default(0),
  number_files_created: z.coerce.number().int().nonnegative().default(0),
});

const xmlParser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (name) => name === 'object',
});

const decoder = new TextDecoder();

/**
 * Decodes a bulk report in the format named by `contentType`
 *
 * @throws {MalformedResponseError}
 */
export function parseBulkResponse(body: Uint8Array, contentType: string): BulkReport {
  const text = decoder.decode(body);
  const mediaType = contentType.split(';')[0]?.trim().toLowerCase() ?? '';

  if (mediaType === 'application/xml' || mediaType === 'text/xml') {
    return parseXmlReport(text);
  }
  return parseJsonReport(text);
}

/**
 * Returns the error a report describes, or undefined for a clean success
 */
export function bulkErrorOf(report: BulkReport): BulkError | undefined {
  const succeeded = report.statusCode >= 200 && report.statusCode < 300;
  if (succeeded && report.objectErrors.length === 0) {
    return undefined;
  }
  return new BulkError(report.statusCode, report.archiveError, report.objectErrors);
}

function parseJsonReport(text: string): BulkReport {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new MalformedResponseError('bulk response', error instanceof Error ? error.message : String(error));
  }

  const result = JsonReportSchema.safeParse(json);
  if (!result.success) {
    throw new MalformedResponseError('bulk response', issuesOf(result.error));
  }

  const report = result.data;
  return {
    statusCode: parseStatusLine(report['Response Status']),
    archiveError: report['Response Body'],
    objectErrors: report.Errors.map(([path, status]) => objectError(path, String(status))),
    numberDeleted: report['Number Deleted'],
    numberNotFound: report['Number Not Found'],
    numberFilesCreated: report['Number Files Created'],
  };
}

function parseXmlReport(text: string): BulkReport {
  let document: unknown;
  try {
    document = xmlParser.parse(text, true);
  } catch (error) {
    throw new MalformedResponseError('bulk response', error instanceof Error ? error.message : String(error));
  }

  const root = z.record(z.unknown()).safeParse(document);
  const reportElement = root.success ? (root.data['delete'] ?? root.data['extract']) : undefined;
  if (reportElement === undefined) {
    throw new MalformedResponseError('bulk response', 'expected <delete> or <extract> root element');
  }

  const result = XmlReportSchema.safeParse(reportElement);
  if (!result.success) {
    throw new MalformedResponseError('bulk response', issuesOf(result.error));
  }

  const report = result.data;
  const objects = report.errors === '' ? [] : report.errors.object;
  return {
    statusCode: parseStatusLine(report.response_status),
    archiveError: report.response_body,
    objectErrors: objects.map((entry) => objectError(entry.name, entry.status)),
    numberDeleted: report.number_deleted,
    numberNotFound: report.number_not_found,
    numberFilesCreated: report.number_files_created,
  };
}

/**
 * "400 Bad Request" -> 400
 */
function parseStatusLine(line: string): number {
  const status = Number.parseInt(line, 10);
  if (Number.isNaN(status)) {
    throw new MalformedResponseError('bulk response', `bad status line "${line}"`);
  }
  return status;
}

/**
 * Builds the error for one failed item from its quoted "/container/object"
 * path and status line
 */
function objectError(path: string, statusLine: string): BulkObjectError {
  const trimmed = path.startsWith('/') ? path.slice(1) : path;
  const slash = trimmed.indexOf('/');
  const containerName = slash < 0 ? trimmed : trimmed.slice(0, slash);
  const objectName = slash < 0 ? '' : trimmed.slice(slash + 1);
  return new BulkObjectError(safeDecode(containerName), safeDecode(objectName), parseStatusLine(statusLine));
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function issuesOf(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
}
