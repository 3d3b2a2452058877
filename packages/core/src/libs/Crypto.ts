import { keccak256, toUtf8Bytes } from "ethers";
import { canonicalEncode } from "./Encoding";

/**
 * Hash a value using keccak256 after canonical encoding.
 */
export function hashState(state: unknown): string {
  return keccak256(toUtf8Bytes(canonicalEncode(state)));
}

/**
 * Compute the hash chain link: H(prevHash || currentData).
 */
export function chainHash(prevHash: string, data: unknown): string {
  return keccak256(toUtf8Bytes(prevHash + canonicalEncode(data)));
}

export interface CellIdentity {
  puzzleId: string;
  position: number;
  encodedToken: string;
  solutionChar: string | null;
  isSymbol: boolean;
}

/** Stable cell id: the same puzzle always re-derives the same ids. */
export function deriveCellId(identity: CellIdentity): string {
  return hashState(identity).slice(0, 18);
}
