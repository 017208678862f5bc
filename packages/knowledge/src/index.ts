export { CellSet, cellKey, formatCell } from "./cell";
export type { Cell, ReadonlyCellSet } from "./cell";
export { Sentence } from "./Sentence";
export { KnowledgeBase, PASSES_PER_CELL } from "./KnowledgeBase";
export type { KnowledgeBaseOptions, InferenceReport } from "./KnowledgeBase";
export {
  KnowledgeError,
  ContractViolationError,
  InvariantViolationError,
  isKnowledgeError,
} from "./errors";
