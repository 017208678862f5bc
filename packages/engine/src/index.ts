export { GameRegistry } from "./GameRegistry";
export { MatchOrchestrator } from "./MatchOrchestrator";
export type { MatchOrchestratorOptions, SubmitResult } from "./MatchOrchestrator";
export type { IGameModule, GameUISpec, GlyphDisplay } from "./interfaces/IGameModule";
