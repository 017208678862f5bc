import { Action } from "@deduce/core";
import { GameUISpec } from "@deduce/engine";
import { readPublicBoard } from "./observation";
import { isCoord } from "./state";

const COMMANDS = new Map<string, string>([
  ["r", "reveal"],
  ["reveal", "reveal"],
  ["f", "flag"],
  ["flag", "flag"],
  ["u", "unflag"],
  ["unflag", "unflag"],
]);

const GLYPHS = {
  hidden: { symbol: ".", label: "hidden" },
  flag: { symbol: "F", label: "flag" },
  mine: { symbol: "*", label: "mine" },
};

export const MinesweeperUI: GameUISpec = {
  glyphs: GLYPHS,

  inputHint: 'Enter "r R C" to reveal, "f R C" to flag, "u R C" to unflag, or "resign"',

  renderBoard(publicData: Record<string, unknown>): string {
    const board = readPublicBoard(publicData);
    if (!board) return "Waiting for game state...";

    const mines = new Set((board.mines ?? []).map(({ row, col }) => `${row},${col}`));
    const cellWidth = String(board.width - 1).length;
    const labelWidth = String(board.height - 1).length;

    const lines: string[] = [];
    const header: string[] = [];
    for (let c = 0; c < board.width; c++) header.push(String(c).padStart(cellWidth));
    lines.push(`${" ".repeat(labelWidth)}  ${header.join(" ")}`);

    for (let r = 0; r < board.height; r++) {
      const cells: string[] = [];
      for (let c = 0; c < board.width; c++) {
        const count = board.revealed[r][c];
        let glyph = GLYPHS.hidden.symbol;
        if (count !== null) glyph = String(count);
        else if (board.flagged[r][c]) glyph = GLYPHS.flag.symbol;
        else if (mines.has(`${r},${c}`)) glyph = GLYPHS.mine.symbol;
        cells.push(glyph.padStart(cellWidth));
      }
      lines.push(`${String(r).padStart(labelWidth)}  ${cells.join(" ")}`);
    }

    return lines.join("\n");
  },

  renderStatus(publicData: Record<string, unknown>): string | null {
    const board = readPublicBoard(publicData);
    if (!board) return null;

    switch (board.status) {
      case "lost":
        return board.exploded
          ? `Boom! Mine at (${board.exploded.row},${board.exploded.col}).`
          : "Boom!";
      case "won":
        return "Board solved!";
      case "resigned":
        return "You resigned.";
      default:
        return `${board.mineCount - board.flagsPlaced} mines left`;
    }
  },

  parseInput(
    raw: string,
    publicData: Record<string, unknown>
  ): Action | null {
    const trimmed = raw.trim().toLowerCase();

    if (trimmed === "resign") {
      return { type: "resign", data: {} };
    }

    const match = trimmed.match(/^([a-z]+)\s+(\d+)\s+(\d+)$/);
    if (!match) return null;

    const type = COMMANDS.get(match[1]);
    if (!type) return null;

    const row = parseInt(match[2], 10);
    const col = parseInt(match[3], 10);
    const board = readPublicBoard(publicData);
    if (board && (row >= board.height || col >= board.width)) return null;

    return { type, data: { row, col } };
  },

  formatAction(action: Action): string {
    if (action.type === "resign") {
      return "resign";
    }
    if (isCoord(action.data)) {
      return `${action.type} (${action.data.row},${action.data.col})`;
    }
    return action.type;
  },
};
