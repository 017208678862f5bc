import { keccak256, toUtf8Bytes } from "ethers";
import { canonicalEncode } from "./Encoding";

/** keccak256 of the canonical encoding of `state`. */
export function hashState(state: unknown): string {
  return keccak256(toUtf8Bytes(canonicalEncode(state)));
}

/**
 * Link in the transcript hash chain: H(prevHash || canonical(data)).
 */
export function chainHash(prevHash: string, data: unknown): string {
  return keccak256(toUtf8Bytes(prevHash + canonicalEncode(data)));
}
