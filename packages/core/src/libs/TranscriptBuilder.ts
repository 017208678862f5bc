import { TranscriptEntry, MatchTranscript } from "../types/match";
import { hashState, chainHash } from "./Crypto";

/**
 * Records the moves of one match as a hash chain: every entry carries the
 * hash of the state it produced and the running hash of all entries before it.
 */
export class TranscriptBuilder {
  private readonly matchId: string;
  private readonly gameId: string;
  private readonly entries: TranscriptEntry[] = [];
  private currentHash: string;

  constructor(matchId: string, gameId: string, initialState: unknown) {
    this.matchId = matchId;
    this.gameId = gameId;
    this.currentHash = hashState(initialState);
  }

  addEntry(
    playerId: string,
    action: unknown,
    newState: unknown,
    timestamp: number = Date.now()
  ): TranscriptEntry {
    const entry: TranscriptEntry = {
      sequence: this.entries.length,
      playerId,
      action,
      stateHash: hashState(newState),
      prevHash: this.currentHash,
      timestamp,
    };

    this.currentHash = chainHash(this.currentHash, entry);
    this.entries.push(entry);
    return entry;
  }

  getTranscript(): MatchTranscript {
    return {
      matchId: this.matchId,
      gameId: this.gameId,
      entries: [...this.entries],
      rootHash: this.currentHash,
    };
  }

  getCurrentHash(): string {
    return this.currentHash;
  }

  getEntryCount(): number {
    return this.entries.length;
  }
}

/**
 * Recompute the chain of a transcript from its initial state hash.
 * Returns the index of the first entry whose prevHash does not match,
 * or -1 when the whole chain is intact.
 */
export function findBrokenLink(
  transcript: MatchTranscript,
  initialStateHash: string
): number {
  let hash = initialStateHash;
  for (let i = 0; i < transcript.entries.length; i++) {
    const entry = transcript.entries[i];
    if (entry.prevHash !== hash) return i;
    hash = chainHash(hash, entry);
  }
  return hash === transcript.rootHash ? -1 : transcript.entries.length;
}
