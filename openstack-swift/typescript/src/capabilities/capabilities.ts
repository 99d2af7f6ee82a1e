/**
 * Cluster capabilities from the /info endpoint
 */

import { z } from 'zod';
import { MalformedResponseError } from '../errors/index.js';
import {
  EXPECTED_STATUS,
  executeForBody,
  withOptions,
  type RequestContext,
  type RequestOptions,
} from '../request/index.js';

/**
 * Default of `bulk_delete.max_deletes_per_request` in Swift
 */
export const DEFAULT_MAX_DELETES_PER_REQUEST = 10000;

export const CapabilitiesSchema = z
  .object({
    swift: z
      .object({
        version: z.string().optional(),
        max_file_size: z.number().optional(),
        max_meta_name_length: z.number().optional(),
        max_meta_value_length: z.number().optional(),
        container_listing_limit: z.number().optional(),
      })
      .passthrough()
      .optional(),
    bulk_delete: z
      .object({
        max_deletes_per_request: z.number().int().positive().optional(),
        max_failed_deletes: z.number().int().nonnegative().optional(),
      })
      .passthrough()
      .optional(),
    bulk_upload: z
      .object({
        max_containers_per_extraction: z.number().int().nonnegative().optional(),
        max_failed_extractions: z.number().int().nonnegative().optional(),
      })
      .passthrough()
      .optional(),
    slo: z
      .object({
        max_manifest_segments: z.number().int().positive().optional(),
        max_manifest_size: z.number().int().positive().optional(),
        min_segment_size: z.number().int().nonnegative().optional(),
      })
      .passthrough()
      .optional(),
    tempurl: z
      .object({
        methods: z.array(z.string()).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type Capabilities = z.infer<typeof CapabilitiesSchema>;

/**
 * URL of the /info endpoint for a storage URL. The endpoint sits at the
 * root of the proxy, beside the /v1 API prefix.
 */
export function infoUrl(storageUrl: string): string {
  const url = new URL(storageUrl);
  const versionIndex = url.pathname.indexOf('/v1/');
  const prefix = versionIndex >= 0 ? url.pathname.slice(0, versionIndex) : '';
  return `${url.origin}${prefix}/info`;
}

const decoder = new TextDecoder();

/**
 * GETs and validates the capabilities document
 *
 * @throws {MalformedResponseError} If the document is not valid JSON or
 *   does not match the expected shape
 */
export async function fetchCapabilities(ctx: RequestContext, opts?: RequestOptions): Promise<Capabilities> {
  const response = await executeForBody(
    ctx,
    withOptions(
      {
        method: 'GET',
        baseUrl: infoUrl(ctx.storageUrl),
        headers: { Accept: 'application/json' },
        expectStatus: EXPECTED_STATUS.account.capabilities,
      },
      opts
    )
  );

  let json: unknown;
  try {
    json = JSON.parse(decoder.decode(response.body));
  } catch (error) {
    throw new MalformedResponseError('capabilities', error instanceof Error ? error.message : String(error));
  }

  const result = CapabilitiesSchema.safeParse(json);
  if (!result.success) {
    throw new MalformedResponseError('capabilities', result.error.issues.map((issue) => issue.message).join(', '));
  }
  return result.data;
}
