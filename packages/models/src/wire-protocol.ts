/**
 * @module wire-protocol
 * Newline-delimited JSON spoken with the backend worker over stdio.
 *
 * Requests (one per line, stdin):
 * ```json
 * {"id":1,"op":"encode","image":{"dtype":"uint8","shape":[480,640,3],"axes":"yxc","data":"<base64>"}}
 * {"id":2,"op":"points","positive":[[10,20]],"negative":[[5,5]]}
 * {"id":3,"op":"box","box":[3,7,20,15]}
 * {"id":4,"op":"mask","mask":{"dtype":"float32","shape":[480,640],"data":"<base64>"}}
 * ```
 *
 * Replies (stdout) echo the request id:
 * ```json
 * {"id":2,"ok":true,"contours_x":[[1,5,5]],"contours_y":[[2,2,6]]}
 * {"id":3,"ok":false,"error":"CUDA out of memory"}
 * ```
 * Any other stdout line is diagnostic output.
 */

import { z } from 'zod';
import type { BoxArray, IntPair, NumericArray } from '@sam-adapter/types';

// ============================================================================
// Requests
// ============================================================================

/** Element type names as the worker's array library spells them. */
export type Dtype =
  | 'uint8'
  | 'int8'
  | 'uint16'
  | 'int16'
  | 'uint32'
  | 'int32'
  | 'float32'
  | 'float64';

/** Typed array serialized as base64 of its raw little-endian bytes. */
export interface EncodedArray {
  dtype: Dtype;
  shape: number[];
  data: string;
}

export type WorkerRequest =
  | { op: 'encode'; image: EncodedArray & { axes: string } }
  | { op: 'points'; positive: IntPair[]; negative?: IntPair[] }
  | { op: 'box'; box: BoxArray }
  | { op: 'mask'; mask: EncodedArray };

export function dtypeOf(data: NumericArray): Dtype {
  if (data instanceof Uint8Array || data instanceof Uint8ClampedArray) return 'uint8';
  if (data instanceof Int8Array) return 'int8';
  if (data instanceof Uint16Array) return 'uint16';
  if (data instanceof Int16Array) return 'int16';
  if (data instanceof Uint32Array) return 'uint32';
  if (data instanceof Int32Array) return 'int32';
  if (data instanceof Float32Array) return 'float32';
  return 'float64';
}

export function encodeArray(data: NumericArray, shape: readonly number[]): EncodedArray {
  return {
    dtype: dtypeOf(data),
    shape: [...shape],
    data: Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64'),
  };
}

/** Serialize a request as one protocol line, newline included. */
export function formatRequest(id: number, request: WorkerRequest): string {
  return `${JSON.stringify({ id, ...request })}\n`;
}

// ============================================================================
// Replies
// ============================================================================

const ContourListSchema = z.array(z.array(z.number().int()));

export const WorkerReplySchema = z.discriminatedUnion('ok', [
  z.object({
    id: z.number().int(),
    ok: z.literal(true),
    contours_x: ContourListSchema.optional(),
    contours_y: ContourListSchema.optional(),
  }),
  z.object({
    id: z.number().int(),
    ok: z.literal(false),
    error: z.string(),
  }),
]);

export type WorkerReply = z.infer<typeof WorkerReplySchema>;

/** Result of reading one stdout line. */
export type ParsedLine =
  | { kind: 'reply'; reply: WorkerReply }
  | { kind: 'invalid'; id: number | null; reason: string }
  | { kind: 'diagnostic' };

function readId(value: unknown): number | null {
  if (typeof value !== 'object' || value === null || !('id' in value)) return null;
  return typeof value.id === 'number' ? value.id : null;
}

/**
 * Classify a stdout line. JSON objects carrying an `id` are replies and
 * must match {@link WorkerReplySchema}; everything else is diagnostic.
 */
export function parseLine(line: string): ParsedLine {
  const trimmed = line.trim();
  if (!trimmed.startsWith('{')) return { kind: 'diagnostic' };

  let value: unknown;
  try {
    value = JSON.parse(trimmed);
  } catch {
    return { kind: 'diagnostic' };
  }

  const id = readId(value);
  if (id === null) return { kind: 'diagnostic' };

  const result = WorkerReplySchema.safeParse(value);
  if (!result.success) {
    return { kind: 'invalid', id, reason: result.error.issues.map((i) => i.message).join('; ') };
  }
  return { kind: 'reply', reply: result.data };
}
