/**
 * Record dump lines are label/value pairs: `time=0 lat=1 lon=2 tmin=-5.3`
 * (ncks writes labels like `time[0]`). Each dimension ordinal p owns tokens 2p and 2p+1.
 */

export function tokenizeRecordLine(line: string): string[] {
  return line.split(/[\s=]+/).filter((t) => t !== "");
}

/** 0-based token index of the value belonging to ordinal p. */
export function valueTokenIndex(ordinal: number): number {
  return ordinal * 2 + 1;
}
