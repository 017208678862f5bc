export enum MatchStatus {
  ACTIVE = "active",
  COMPLETED = "completed",
}

export interface TranscriptEntry {
  sequence: number;
  playerId: string;
  action: unknown;
  stateHash: string;
  prevHash: string;
  timestamp: number;
}

export interface MatchTranscript {
  matchId: string;
  gameId: string;
  entries: TranscriptEntry[];
  /** Hash of the last link in the chain (or of the initial state when empty). */
  rootHash: string;
}
