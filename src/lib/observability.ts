import { createHash } from 'node:crypto';
import { tracingChannel } from 'node:diagnostics_channel';

// --- Configuration ---

const ENV = process.env;

interface Config {
  enabled: boolean;
  detail: 0 | 1 | 2;
}

function readConfig(): Config {
  return {
    enabled: isTrue(ENV['MINIGREP_DIAGNOSTICS']),
    detail: parseDetail(ENV['MINIGREP_DIAGNOSTICS_DETAIL']),
  };
}

function isTrue(val?: string): boolean {
  const norm = val?.trim().toLowerCase();
  return norm === '1' || norm === 'true' || norm === 'yes';
}

function parseDetail(val?: string): 0 | 1 | 2 {
  const norm = val?.trim();
  if (norm === '2') return 2;
  if (norm === '1') return 1;
  return 0;
}

// --- Domain Types ---

export interface OpsTraceContext {
  op: string;
  path?: string;
  [key: string]: unknown;
}

const OPS_TRACE = tracingChannel<unknown, OpsTraceContext>('minigrep:ops');

function hashPath(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 16);
}

function normalizePath(path: string | undefined): string | undefined {
  const { detail } = readConfig();
  if (!path || detail === 0) return undefined;
  if (detail === 2) return path;
  return hashPath(path);
}

function normalizeContext(ctx: OpsTraceContext): OpsTraceContext {
  if (!ctx.path) return ctx;
  const normalized = normalizePath(ctx.path);
  if (!normalized) {
    const copy = { ...ctx };
    delete copy.path;
    return copy;
  }
  return { ...ctx, path: normalized };
}

// --- Public API ---

export function shouldPublishOpsTrace(): boolean {
  return readConfig().enabled && OPS_TRACE.hasSubscribers;
}

export function publishOpsTraceStart(context: OpsTraceContext): void {
  OPS_TRACE.start.publish(normalizeContext(context));
}

export function publishOpsTraceEnd(context: OpsTraceContext): void {
  OPS_TRACE.end.publish(normalizeContext(context));
}

export function publishOpsTraceError(
  context: OpsTraceContext,
  error: unknown
): void {
  OPS_TRACE.error.publish({
    ...normalizeContext(context),
    error,
  });
}

type TraceSummary<T> = (result: T) => Record<string, unknown>;

function finishContext<T>(
  context: OpsTraceContext,
  result: T,
  summarize?: TraceSummary<T>
): OpsTraceContext {
  return summarize ? { ...context, ...summarize(result) } : context;
}

export function traceOp<T>(
  context: OpsTraceContext,
  run: () => T,
  summarize?: TraceSummary<T>
): T {
  if (!shouldPublishOpsTrace()) return run();

  publishOpsTraceStart(context);
  try {
    const result = run();
    publishOpsTraceEnd(finishContext(context, result, summarize));
    return result;
  } catch (error: unknown) {
    publishOpsTraceError(context, error);
    publishOpsTraceEnd(context);
    throw error;
  }
}

export async function traceOpAsync<T>(
  context: OpsTraceContext,
  run: () => Promise<T>,
  summarize?: TraceSummary<T>
): Promise<T> {
  if (!shouldPublishOpsTrace()) return await run();

  publishOpsTraceStart(context);
  try {
    const result = await run();
    publishOpsTraceEnd(finishContext(context, result, summarize));
    return result;
  } catch (error: unknown) {
    publishOpsTraceError(context, error);
    publishOpsTraceEnd(context);
    throw error;
  }
}
