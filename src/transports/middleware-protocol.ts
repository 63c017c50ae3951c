/**
 * Frames of the appliance middleware WebSocket protocol
 */

import type { JobEvent, JobState } from '../types/index.js';
import { isRecord, readNumber, readRecord, readString } from '../utils/type-guards.js';

export const PROTOCOL_VERSION = '1';
export const JOB_COLLECTION = 'core.get_jobs';

export interface ConnectFrame {
  msg: 'connect';
  version: string;
  support: string[];
}

export interface MethodFrame {
  id: string;
  msg: 'method';
  method: string;
  params: unknown[];
}

export interface SubscribeFrame {
  id: string;
  msg: 'sub';
  name: string;
}

export interface PongFrame {
  msg: 'pong';
  id?: string;
}

export type ClientFrame = ConnectFrame | MethodFrame | SubscribeFrame | PongFrame;

export interface MiddlewareError {
  error?: number | string;
  errname?: string;
  reason?: string;
  message?: string;
}

export type ServerFrame =
  | { msg: 'connected'; session?: string }
  | { msg: 'failed'; version?: string }
  | { msg: 'ping'; id?: string }
  | { msg: 'result'; id: string; result?: unknown; error?: MiddlewareError }
  | { msg: 'added' | 'changed'; collection: string; id: string | number; fields: Record<string, unknown> }
  | { msg: 'ready'; subs?: unknown }
  | { msg: 'nosub'; id?: string };

const MIDDLEWARE_JOB_STATES: Record<string, JobState> = {
  WAITING: 'QUEUED',
  RUNNING: 'RUNNING',
  SUCCESS: 'SUCCEEDED',
  FAILED: 'FAILED',
  ABORTED: 'CANCELLED',
};

export function mapMiddlewareJobState(state: string): JobState | undefined {
  return MIDDLEWARE_JOB_STATES[state.toUpperCase()];
}

function readError(value: unknown): MiddlewareError | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const code = value.error;
  return {
    error: typeof code === 'number' || typeof code === 'string' ? code : undefined,
    errname: readString(value, 'errname'),
    reason: readString(value, 'reason'),
    message: readString(value, 'message'),
  };
}

/**
 * Narrow a decoded JSON value to a known server frame. Returns null for anything else.
 */
export function parseServerFrame(value: unknown): ServerFrame | null {
  if (!isRecord(value)) {
    return null;
  }
  const msg = readString(value, 'msg');
  const id = readString(value, 'id');

  switch (msg) {
    case 'connected':
      return { msg, session: readString(value, 'session') };
    case 'failed':
      return { msg, version: readString(value, 'version') };
    case 'ping':
      return { msg, id };
    case 'result': {
      if (id === undefined) {
        return null;
      }
      const error = readError(value.error);
      return error ? { msg, id, error } : { msg, id, result: value.result };
    }
    case 'added':
    case 'changed': {
      const collection = readString(value, 'collection');
      const fields = readRecord(value, 'fields');
      const frameId = typeof value.id === 'number' ? value.id : id;
      if (!collection || !fields || frameId === undefined) {
        return null;
      }
      return { msg, collection, id: frameId, fields };
    }
    case 'ready':
      return { msg, subs: value.subs };
    case 'nosub':
      return { msg, id };
    default:
      return null;
  }
}

export function formatMiddlewareError(error: MiddlewareError): string {
  return error.reason ?? error.message ?? error.errname ?? JSON.stringify(error);
}

/**
 * Build a job event from a middleware job record (push `fields` or a `core.get_jobs` row)
 */
export function jobEventFromRecord(record: Record<string, unknown>, fallbackId?: string | number): JobEvent | null {
  const rawId = record.id ?? fallbackId;
  if (typeof rawId !== 'number' && typeof rawId !== 'string') {
    return null;
  }

  const event: JobEvent = { jobId: String(rawId) };

  const rawState = readString(record, 'state');
  if (rawState !== undefined) {
    const state = mapMiddlewareJobState(rawState);
    if (!state) {
      return null;
    }
    event.state = state;
  }

  const progress = readRecord(record, 'progress');
  if (progress) {
    const percent = readNumber(progress, 'percent');
    const description = readString(progress, 'description');
    event.progress = {
      ...(percent !== undefined ? { percent } : {}),
      ...(description !== undefined ? { description } : {}),
    };
  }

  const error = readString(record, 'error');
  if (error) {
    event.error = error;
  }
  const result = record.result;
  if (typeof result === 'string') {
    event.detail = result;
  } else if (result !== undefined && result !== null) {
    event.detail = JSON.stringify(result);
  }
  return event;
}

/**
 * Job event carried by an `added`/`changed` frame, or null for other collections
 */
export function toJobEvent(frame: ServerFrame): JobEvent | null {
  if ((frame.msg !== 'added' && frame.msg !== 'changed') || frame.collection !== JOB_COLLECTION) {
    return null;
  }
  return jobEventFromRecord(frame.fields, frame.id);
}
