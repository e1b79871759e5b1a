import { v5 as uuidv5 } from 'uuid';

// Fixed namespace so the same record always maps to the same row id
const RECORD_NAMESPACE = '6f1c2b7e-4d0a-5e8b-9c3f-2a7d1e0b5c94';

/**
 * Deterministic row id from the fields that identify a record
 */
export function recordId(...parts: Array<string | number>): string {
  return uuidv5(parts.join('|'), RECORD_NAMESPACE);
}
