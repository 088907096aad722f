/**
 * Debug event sink.
 *
 * Enabled through `ValidateOptions.debug`; writes one line per event to
 * stderr as `[corral] <event> <json>`.
 */

export type DebugEvent =
  | 'dispatch'
  | 'condition-skipped'
  | 'unknown-field'
  | 'bucket-write'
  | 'cancelled'
  | 'rule-threw';

export type DebugFields = Record<string, unknown>;

export interface DebugSink {
  readonly enabled: boolean;
  emit(event: DebugEvent, fields?: DebugFields): void;
}

export type DebugWriter = (line: string) => void;

const stderrWriter: DebugWriter = (line) => {
  process.stderr.write(`${line}\n`);
};

export const silentSink: DebugSink = {
  enabled: false,
  emit: () => undefined,
};

function safeStringify(fields: DebugFields): string {
  try {
    return JSON.stringify(fields, (_key, value: unknown) =>
      typeof value === 'bigint' ? value.toString() : value
    );
  } catch {
    return '{"unserializable":true}';
  }
}

export function createDebugSink(
  enabled: boolean | DebugWriter,
  writer: DebugWriter = stderrWriter
): DebugSink {
  if (enabled === false) return silentSink;
  const write = typeof enabled === 'function' ? enabled : writer;
  return {
    enabled: true,
    emit(event, fields) {
      const suffix = fields ? ` ${safeStringify(fields)}` : '';
      write(`[corral] ${event}${suffix}`);
    },
  };
}
