import { Action, GameState } from "@deduce/core";
import { readData, statusOf } from "./state";

/** Reveal a hidden cell */
export interface RevealAction extends Action {
  type: "reveal";
  data: { row: number; col: number };
}

/** Mark a hidden cell as a suspected mine */
export interface FlagAction extends Action {
  type: "flag";
  data: { row: number; col: number };
}

/** Remove a flag */
export interface UnflagAction extends Action {
  type: "unflag";
  data: { row: number; col: number };
}

export interface ResignAction extends Action {
  type: "resign";
  data: Record<string, unknown>;
}

function hasCell(action: Action): boolean {
  return typeof action.data.row === "number" && typeof action.data.col === "number";
}

export function isRevealAction(action: Action): action is RevealAction {
  return action.type === "reveal" && hasCell(action);
}

export function isFlagAction(action: Action): action is FlagAction {
  return action.type === "flag" && hasCell(action);
}

export function isUnflagAction(action: Action): action is UnflagAction {
  return action.type === "unflag" && hasCell(action);
}

export function isResignAction(action: Action): action is ResignAction {
  return action.type === "resign";
}

export function reveal(row: number, col: number): RevealAction {
  return { type: "reveal", data: { row, col } };
}

export function flag(row: number, col: number): FlagAction {
  return { type: "flag", data: { row, col } };
}

export function unflag(row: number, col: number): UnflagAction {
  return { type: "unflag", data: { row, col } };
}

export function resign(): ResignAction {
  return { type: "resign", data: {} };
}

export function getLegalActionsForPlayer(
  state: GameState,
  playerId: string
): Action[] {
  if (state.currentPlayer !== playerId) return [];

  const data = readData(state.data);
  if (statusOf(data) !== "playing") return [];

  const actions: Action[] = [];
  for (let r = 0; r < data.height; r++) {
    for (let c = 0; c < data.width; c++) {
      if (data.revealed[r][c] !== null) continue;
      if (data.flagged[r][c]) {
        actions.push(unflag(r, c));
      } else {
        actions.push(reveal(r, c), flag(r, c));
      }
    }
  }

  // Always allow resign
  actions.push(resign());

  return actions;
}
