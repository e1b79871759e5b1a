/**
 * Result of a situational adjustment producer
 */
export type SignalResult =
  | { kind: 'signal'; points: number; tag: string }
  | { kind: 'insufficient'; points: number; tag: string; reason: string }
  | { kind: 'no-data'; reason: string };

export function signal(points: number, tag: string): SignalResult {
  return { kind: 'signal', points, tag };
}

export function noData(reason: string): SignalResult {
  return { kind: 'no-data', reason };
}

/** Confidence points contributed; absent data contributes nothing */
export function signalPoints(result: SignalResult): number {
  return result.kind === 'no-data' ? 0 : result.points;
}

export function signalTag(result: SignalResult): string {
  return result.kind === 'no-data' ? '' : result.tag;
}
