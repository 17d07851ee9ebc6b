/**
 * Row factories for ingestion tests
 */

import { getNextRecordId } from "../setup/reset";

/** A flat record with one field of each common scalar kind */
export interface MockPersonRecord {
  id: number;
  name: string;
  score: number;
  active: boolean;
}

/**
 * Create a person record with a unique id
 * @param overrides - Optional fields to override defaults
 */
export function createPersonRecord(
  overrides: Partial<MockPersonRecord> = {},
): MockPersonRecord {
  const id = getNextRecordId();
  return {
    id,
    name: `person-${id}`,
    score: id + 0.5,
    active: id % 2 === 1,
    ...overrides,
  };
}

export function createPersonRecords(count: number): MockPersonRecord[] {
  return Array.from({ length: count }, () => createPersonRecord());
}

/**
 * The same records as positional tuples, in `id, name, score, active` order
 */
export function toPersonTuples(
  records: readonly MockPersonRecord[],
): Array<[number, string, number, boolean]> {
  return records.map((r) => [r.id, r.name, r.score, r.active]);
}

/**
 * Column-oriented view of person records, keyed by field name
 */
export function toPersonColumns(records: readonly MockPersonRecord[]): {
  id: number[];
  name: string[];
  score: number[];
  active: boolean[];
} {
  return {
    id: records.map((r) => r.id),
    name: records.map((r) => r.name),
    score: records.map((r) => r.score),
    active: records.map((r) => r.active),
  };
}
