import { monotonicFactory } from "ulid";

export type RunId = `run_${string}`;

const RUN_ID_PATTERN = /^run_[0-9A-HJKMNP-TV-Z]{26}$/;

export function isRunId(value: string): value is RunId {
  return RUN_ID_PATTERN.test(value);
}

export function toRunId(value: string): RunId {
  if (!isRunId(value)) throw new Error(`invalid run_id: ${value}`);
  return value;
}

/**
 * Returns a generator of run ids that sort in creation order, even when several
 * ids are minted within the same millisecond.
 */
export function runIdFactory(): () => RunId {
  const next = monotonicFactory();
  return () => `run_${next()}`;
}
