/**
 * @module process-backend
 * Backend sessions running in a separate worker process.
 *
 * One worker process per session. The worker loads the model family's
 * weights, encodes the image on the `encode` request and then answers
 * prompt requests; see {@link ./wire-protocol} for the message format.
 * Everything the worker prints besides its replies goes to the session's
 * debug sink.
 */

import { spawn as spawnChild } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type {
  BackendSession,
  BoxArray,
  DebugTextPrinter,
  ImageRaster,
  IntPair,
  ModelDescriptor,
  Polygon,
  Raster,
  SamBackend,
  SessionOptions,
  Size,
} from '@sam-adapter/types';
import {
  BackendRuntimeError,
  InterruptedError,
  MissingArtifactError,
  SessionClosedError,
  contoursToPolygons,
} from '@sam-adapter/core';
import { findMissingArtifact, type BackendConfig } from './backend-config';
import {
  encodeArray,
  formatRequest,
  parseLine,
  type WorkerReply,
  type WorkerRequest,
} from './wire-protocol';

/** The parts of a child process a session uses (duck-typed for testability). */
export interface WorkerProcess {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
}

/** Starts a worker process. */
export type SpawnWorker = (command: string, args: readonly string[]) => WorkerProcess;

const defaultSpawn: SpawnWorker = (command, args) => spawnChild(command, args);

/** Spatial extent of `image`, read from its `x` and `y` axes. */
export function spatialSize(image: ImageRaster): Size {
  const x = image.axes.indexOf('x');
  const y = image.axes.indexOf('y');
  if (x < 0 || y < 0 || image.shape.length !== image.axes.length) {
    throw new BackendRuntimeError(
      `Image axes "${image.axes}" do not describe shape [${image.shape.join(', ')}]`,
    );
  }
  return { width: image.shape[x], height: image.shape[y] };
}

type SuccessReply = Extract<WorkerReply, { ok: true }>;

interface PendingRequest {
  id: number;
  resolve(reply: SuccessReply): void;
  reject(error: Error): void;
}

/** A session talking to one worker process. */
export class ProcessBackendSession implements BackendSession {
  private readonly child: WorkerProcess;
  private readonly debugSink: DebugTextPrinter;
  private imageSize: Size | null = null;
  private pending: PendingRequest | null = null;
  private queue: Promise<unknown> = Promise.resolve();
  private nextId = 0;
  /** Set once the worker can no longer answer. */
  private failure: Error | null = null;

  constructor(child: WorkerProcess, debugSink: DebugTextPrinter) {
    this.child = child;
    this.debugSink = debugSink;

    createInterface({ input: child.stdout }).on('line', (line) => this.handleLine(line));
    createInterface({ input: child.stderr }).on('line', (line) => this.debugSink(line));

    child.once('exit', (code, exitSignal) => {
      this.fail(
        new BackendRuntimeError(
          `Backend process exited (code ${code ?? 'none'}, signal ${exitSignal ?? 'none'})`,
        ),
      );
    });
    child.stdin.on('error', (error) => {
      this.fail(new BackendRuntimeError(`Cannot write to the backend process: ${error.message}`, { cause: error }));
    });
    child.once('error', (error) => {
      const code = 'code' in error ? error.code : undefined;
      this.fail(
        code === 'ENOENT'
          ? new MissingArtifactError(`Cannot start the backend process: ${error.message}`, undefined, { cause: error })
          : new BackendRuntimeError(`Backend process error: ${error.message}`, { cause: error }),
      );
    });
  }

  /**
   * Encode the image the session is bound to. `signal` interrupts only this
   * request; prompts sent afterwards are not affected by it.
   */
  async encode(image: ImageRaster, signal?: AbortSignal): Promise<void> {
    const size = spatialSize(image);
    await this.request(
      { op: 'encode', image: { ...encodeArray(image.data, image.shape), axes: image.axes } },
      signal,
    );
    this.imageSize = size;
  }

  async inferFromPoints(positive: IntPair[], negative?: IntPair[]): Promise<Polygon[]> {
    return this.infer(negative ? { op: 'points', positive, negative } : { op: 'points', positive });
  }

  async inferFromBox(box: BoxArray): Promise<Polygon[]> {
    return this.infer({ op: 'box', box });
  }

  async inferFromMask(mask: Raster): Promise<Polygon[]> {
    const size = this.imageSize;
    if (size && (mask.width !== size.width || mask.height !== size.height)) {
      throw new BackendRuntimeError(
        `Mask is ${mask.width}x${mask.height} but the encoded image is ${size.width}x${size.height}`,
      );
    }
    if (mask.data.length !== mask.width * mask.height) {
      throw new BackendRuntimeError(
        `Mask holds ${mask.data.length} samples, expected ${mask.width * mask.height}`,
      );
    }
    return this.infer({ op: 'mask', mask: encodeArray(mask.data, [mask.height, mask.width]) });
  }

  close(): void {
    if (this.failure instanceof SessionClosedError) return;
    const alive = this.failure === null;
    this.fail(new SessionClosedError());
    if (alive) this.child.kill();
  }

  private async infer(request: WorkerRequest): Promise<Polygon[]> {
    const reply = await this.request(request);
    return contoursToPolygons(reply.contours_x ?? [], reply.contours_y ?? []);
  }

  /** Queue `request` behind the previous one; one request is in flight at a time. */
  private request(request: WorkerRequest, signal?: AbortSignal): Promise<SuccessReply> {
    const send = () => this.send(request, signal);
    const result = this.queue.then(send, send);
    // The caller observes failures through `result`.
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private send(request: WorkerRequest, signal: AbortSignal | undefined): Promise<SuccessReply> {
    return new Promise((resolve, reject) => {
      if (this.failure) {
        reject(this.failure);
        return;
      }
      if (signal?.aborted) {
        reject(new InterruptedError());
        return;
      }

      const id = ++this.nextId;
      const onAbort = (): void => {
        if (this.pending?.id !== id) return;
        this.pending = null;
        reject(new InterruptedError());
      };
      const settle = (): void => {
        signal?.removeEventListener('abort', onAbort);
        this.pending = null;
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.pending = {
        id,
        resolve: (reply) => {
          settle();
          resolve(reply);
        },
        reject: (error) => {
          settle();
          reject(error);
        },
      };
      this.child.stdin.write(formatRequest(id, request));
    });
  }

  private handleLine(line: string): void {
    const parsed = parseLine(line);
    if (parsed.kind === 'diagnostic') {
      this.debugSink(line);
      return;
    }

    const pending = this.pending;
    if (!pending) return;

    if (parsed.kind === 'invalid') {
      if (parsed.id === pending.id) {
        pending.reject(new BackendRuntimeError(`Malformed reply from backend: ${parsed.reason}`));
      }
      return;
    }

    // Late replies to interrupted requests are ignored.
    if (parsed.reply.id !== pending.id) return;
    if (parsed.reply.ok) pending.resolve(parsed.reply);
    else pending.reject(new BackendRuntimeError(parsed.reply.error));
  }

  private fail(error: Error): void {
    if (this.failure) return;
    this.failure = error;
    this.pending?.reject(error);
  }
}

/**
 * Starts {@link ProcessBackendSession}s for one model family.
 *
 * The worker is launched as `<python> <workerScript> --model <family id>`.
 */
export class ProcessBackend implements SamBackend {
  private readonly family: ModelDescriptor;
  private readonly config: BackendConfig;
  private readonly spawn: SpawnWorker;

  constructor(family: ModelDescriptor, config: BackendConfig, spawn: SpawnWorker = defaultSpawn) {
    this.family = family;
    this.config = config;
    this.spawn = spawn;
  }

  async initialize(
    image: ImageRaster,
    debugSink: DebugTextPrinter,
    options: SessionOptions = {},
  ): Promise<ProcessBackendSession> {
    const missing = await findMissingArtifact(this.config, this.family);
    if (missing) {
      throw new MissingArtifactError(`Required backend file is missing: ${missing}`, missing);
    }
    if (options.signal?.aborted) {
      throw new InterruptedError('Interrupted before the backend process started');
    }

    const child = this.spawn(this.config.python, [
      this.config.workerScript,
      '--model',
      this.family.id,
    ]);
    const session = new ProcessBackendSession(child, debugSink);
    try {
      await session.encode(image, options.signal);
    } catch (error) {
      session.close();
      throw error;
    }
    return session;
  }
}
