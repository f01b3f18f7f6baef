/**
 * Source location carried by every construct from parsing through to the bundle.
 */
export interface Provenance {
  file: string;
  line: number;
}

export function provenance(file: string, line: number): Provenance {
  return { file, line };
}
