import { strict as assert } from "assert";
import { Action, GameState } from "@deduce/core";
import { SeededRng } from "./prng";
import { nearbyMines, placeMines } from "./board";
import { MinesweeperModule } from "./rules";
import { MinesweeperUI } from "./ui";
import { newBoardData, readData } from "./state";
import { readPublicBoard } from "./observation";
import { reveal, flag, unflag, resign } from "./actions";

const PLAYER = "player-1";

function config(settings?: Record<string, unknown>) {
  return { gameId: "minesweeper", version: "0.1.0", settings };
}

/** Build a state from rows of "*" (mine) and "." (safe). */
function stateOf(rows: string[]): GameState {
  return {
    gameId: "minesweeper",
    players: [PLAYER],
    currentPlayer: PLAYER,
    turnNumber: 0,
    data: newBoardData(rows.map((row) => [...row].map((c) => c === "*"))),
  };
}

function play(state: GameState, ...actions: Action[]): GameState {
  let next = state;
  for (const action of actions) {
    assert.ok(
      MinesweeperModule.validateAction(next, PLAYER, action),
      `expected ${MinesweeperUI.formatAction(action)} to be valid`
    );
    next = MinesweeperModule.applyAction(next, PLAYER, action);
  }
  return next;
}

const DIAGONAL = ["*..", ".*.", "..."];

describe("SeededRng", () => {
  it("produces deterministic output for the same seed", () => {
    const a = new SeededRng("test-seed");
    const b = new SeededRng("test-seed");
    for (let i = 0; i < 100; i++) {
      assert.equal(a.next(), b.next());
    }
  });

  it("samples distinct indices in range", () => {
    const picks = new SeededRng("sample").sample(20, 20);
    assert.deepEqual(
      [...picks].sort((x, y) => x - y),
      Array.from({ length: 20 }, (_, i) => i)
    );
  });

  it("refuses to sample more than the population", () => {
    assert.throws(() => new SeededRng("x").sample(3, 4), /Cannot sample 4 of 3/);
  });
});

describe("Board", () => {
  it("places exactly the requested number of mines", () => {
    const grid = placeMines(8, 8, 10, "layout");
    assert.equal(grid.flat().filter(Boolean).length, 10);
    assert.equal(grid.length, 8);
    assert.ok(grid.every((row) => row.length === 8));
  });

  it("places the same mines for the same seed", () => {
    assert.deepEqual(placeMines(6, 5, 7, "same"), placeMines(6, 5, 7, "same"));
  });

  it("places no mines when asked for none", () => {
    assert.equal(placeMines(4, 4, 0, "none").flat().some(Boolean), false);
  });

  it("counts mines within one row and column", () => {
    const mines = readData(stateOf(DIAGONAL).data).mines;
    assert.equal(nearbyMines(mines, { row: 0, col: 1 }), 2);
    assert.equal(nearbyMines(mines, { row: 1, col: 0 }), 2);
    assert.equal(nearbyMines(mines, { row: 0, col: 0 }), 1);
    assert.equal(nearbyMines(mines, { row: 2, col: 2 }), 1);
  });
});

describe("MinesweeperModule", () => {
  describe("init", () => {
    it("defaults to an 8x8 board with 8 mines", () => {
      const state = MinesweeperModule.init(config(), [PLAYER], "seed-1");
      const data = readData(state.data);
      assert.equal(data.height, 8);
      assert.equal(data.width, 8);
      assert.equal(data.mineCount, 8);
      assert.equal(state.currentPlayer, PLAYER);
    });

    it("accepts numeric strings as settings", () => {
      const state = MinesweeperModule.init(
        config({ height: "3", width: "4", mines: "2" }),
        [PLAYER],
        "seed-2"
      );
      const data = readData(state.data);
      assert.equal(data.height, 3);
      assert.equal(data.width, 4);
      assert.equal(data.mineCount, 2);
    });

    it("is deterministic per seed", () => {
      const a = MinesweeperModule.init(config(), [PLAYER], "replay");
      const b = MinesweeperModule.init(config(), [PLAYER], "replay");
      assert.deepEqual(readData(a.data).mines, readData(b.data).mines);
    });

    it("rejects bad setups", () => {
      assert.throws(
        () => MinesweeperModule.init(config(), [PLAYER, "player-2"], "s"),
        /exactly 1 player/
      );
      assert.throws(
        () => MinesweeperModule.init(config({ height: 65 }), [PLAYER], "s"),
        /Invalid board size: 65x8/
      );
      assert.throws(
        () => MinesweeperModule.init(config({ mines: 64 }), [PLAYER], "s"),
        /Invalid mine count: 64/
      );
      assert.throws(
        () => MinesweeperModule.init(config({ width: "abc" }), [PLAYER], "s"),
        /Invalid width: abc/
      );
    });
  });

  describe("actions", () => {
    it("reveals the neighbor count of a safe cell", () => {
      const state = play(stateOf(DIAGONAL), reveal(0, 1));
      assert.equal(readData(state.data).revealed[0][1], 2);
      assert.equal(state.turnNumber, 1);
      assert.equal(MinesweeperModule.isTerminal(state), false);
    });

    it("loses on revealing a mine", () => {
      const state = play(stateOf(DIAGONAL), reveal(1, 1));
      assert.equal(MinesweeperModule.isTerminal(state), true);
      assert.deepEqual(MinesweeperModule.getOutcome(state), {
        winner: null,
        draw: false,
        scores: { [PLAYER]: 0 },
        reason: "mine_revealed",
      });
    });

    it("wins once the flags sit exactly on the mines", () => {
      let state = play(stateOf(DIAGONAL), flag(2, 2), flag(0, 0), flag(1, 1));
      assert.equal(MinesweeperModule.isTerminal(state), false);

      state = play(state, unflag(2, 2));
      assert.equal(MinesweeperModule.isTerminal(state), true);
      assert.deepEqual(MinesweeperModule.getOutcome(state), {
        winner: PLAYER,
        draw: false,
        scores: { [PLAYER]: 1 },
        reason: "all_mines_flagged",
      });
    });

    it("wins once every safe cell is revealed", () => {
      const state = play(
        stateOf(DIAGONAL),
        reveal(0, 1),
        reveal(0, 2),
        reveal(1, 0),
        reveal(1, 2),
        reveal(2, 0),
        reveal(2, 1),
        reveal(2, 2)
      );
      assert.equal(MinesweeperModule.getOutcome(state).reason, "board_cleared");
    });

    it("does not count a board without mines as flagged", () => {
      let state = stateOf([".."]);
      assert.equal(MinesweeperModule.isTerminal(state), false);
      state = play(state, reveal(0, 0));
      assert.equal(MinesweeperModule.isTerminal(state), false);
      state = play(state, reveal(0, 1));
      assert.equal(MinesweeperModule.getOutcome(state).reason, "board_cleared");
    });

    it("ends the game on resign", () => {
      const state = play(stateOf(DIAGONAL), resign());
      assert.equal(MinesweeperModule.isTerminal(state), true);
      assert.equal(MinesweeperModule.getOutcome(state).reason, "resigned");
      assert.equal(MinesweeperModule.getOutcome(state).winner, null);
    });

    it("reports a game in progress", () => {
      assert.equal(MinesweeperModule.getOutcome(stateOf(DIAGONAL)).reason, "game_in_progress");
    });

    it("rejects invalid actions", () => {
      const state = play(stateOf(DIAGONAL), reveal(0, 1), flag(2, 2));
      const invalid: Action[] = [
        reveal(0, 1),
        reveal(2, 2),
        flag(0, 1),
        flag(2, 2),
        unflag(0, 2),
        reveal(3, 0),
        reveal(0, -1),
        { type: "reveal", data: { row: "0", col: 0 } },
        { type: "dig", data: { row: 0, col: 0 } },
      ];
      for (const action of invalid) {
        assert.equal(
          MinesweeperModule.validateAction(state, PLAYER, action),
          false,
          JSON.stringify(action)
        );
      }
      assert.equal(MinesweeperModule.validateAction(state, "someone-else", reveal(0, 2)), false);
    });

    it("rejects every action once the game is over", () => {
      const state = play(stateOf(DIAGONAL), reveal(0, 0));
      assert.equal(MinesweeperModule.validateAction(state, PLAYER, reveal(0, 1)), false);
      assert.equal(MinesweeperModule.validateAction(state, PLAYER, resign()), false);
      assert.deepEqual(MinesweeperModule.getLegalActions(state, PLAYER), []);
    });

    it("lists reveal and flag per hidden cell, unflag per flag, and resign", () => {
      const fresh = stateOf(DIAGONAL);
      assert.equal(MinesweeperModule.getLegalActions(fresh, PLAYER).length, 19);
      assert.equal(MinesweeperModule.getLegalActions(play(fresh, flag(0, 0)), PLAYER).length, 18);
      assert.equal(MinesweeperModule.getLegalActions(play(fresh, reveal(0, 1)), PLAYER).length, 17);
      assert.deepEqual(MinesweeperModule.getLegalActions(fresh, "someone-else"), []);
    });

    it("does not mutate the previous state", () => {
      const before = stateOf(DIAGONAL);
      play(before, reveal(0, 1), flag(0, 0));
      const data = readData(before.data);
      assert.equal(data.revealed[0][1], null);
      assert.equal(data.flagged[0][0], false);
    });
  });

  describe("observation", () => {
    it("hides mines while the game is in progress", () => {
      const state = play(stateOf(DIAGONAL), reveal(0, 1), flag(0, 0));
      const obs = MinesweeperModule.getObservation(state, PLAYER);
      assert.equal(obs.publicData.mines, null);

      const board = readPublicBoard(obs.publicData);
      assert.ok(board);
      assert.equal(board.status, "playing");
      assert.equal(board.revealed[0][1], 2);
      assert.equal(board.flagsPlaced, 1);
      assert.equal(board.mineCount, 2);
    });

    it("shows mines once the game is over", () => {
      const state = play(stateOf(DIAGONAL), reveal(0, 0));
      const board = readPublicBoard(MinesweeperModule.getObservation(state, PLAYER).publicData);
      assert.ok(board);
      assert.equal(board.status, "lost");
      assert.deepEqual(board.exploded, { row: 0, col: 0 });
      assert.deepEqual(board.mines, [
        { row: 0, col: 0 },
        { row: 1, col: 1 },
      ]);
    });

    it("rejects records that are not boards", () => {
      assert.equal(readPublicBoard({}), null);
      assert.equal(readPublicBoard({ height: 1, width: 1 }), null);
    });
  });
});

describe("MinesweeperUI", () => {
  const observe = (state: GameState) => MinesweeperModule.getObservation(state, PLAYER).publicData;

  it("renders hidden, flagged and revealed cells", () => {
    const state = play(stateOf(["*..", "..."]), reveal(0, 2), flag(0, 0));
    assert.equal(MinesweeperUI.renderBoard(observe(state)), ["   0 1 2", "0  F . 0", "1  . . ."].join("\n"));
  });

  it("renders mines after a loss", () => {
    const state = play(stateOf(["*..", "..."]), reveal(0, 0));
    assert.equal(MinesweeperUI.renderBoard(observe(state)), ["   0 1 2", "0  * . .", "1  . . ."].join("\n"));
  });

  it("pads columns on wide boards", () => {
    const lines = MinesweeperUI.renderBoard(observe(stateOf(["............"]))).split("\n");
    assert.equal(lines[0], "    0  1  2  3  4  5  6  7  8  9 10 11");
    assert.equal(lines[1], "0   .  .  .  .  .  .  .  .  .  .  .  .");
  });

  it("waits for a valid board", () => {
    assert.equal(MinesweeperUI.renderBoard({}), "Waiting for game state...");
    assert.equal(MinesweeperUI.renderStatus({}), null);
  });

  it("reports status", () => {
    const fresh = stateOf(DIAGONAL);
    assert.equal(MinesweeperUI.renderStatus(observe(fresh)), "2 mines left");
    assert.equal(MinesweeperUI.renderStatus(observe(play(fresh, flag(2, 2)))), "1 mines left");
    assert.equal(MinesweeperUI.renderStatus(observe(play(fresh, reveal(1, 1)))), "Boom! Mine at (1,1).");
    assert.equal(MinesweeperUI.renderStatus(observe(play(fresh, resign()))), "You resigned.");
    assert.equal(
      MinesweeperUI.renderStatus(observe(play(fresh, flag(0, 0), flag(1, 1)))),
      "Board solved!"
    );
  });

  it("parses input", () => {
    const publicData = observe(stateOf(DIAGONAL));
    assert.deepEqual(MinesweeperUI.parseInput("r 1 2", publicData), reveal(1, 2));
    assert.deepEqual(MinesweeperUI.parseInput("F 0 0", publicData), flag(0, 0));
    assert.deepEqual(MinesweeperUI.parseInput("unflag 2 1", publicData), unflag(2, 1));
    assert.deepEqual(MinesweeperUI.parseInput("  resign ", publicData), resign());
    assert.equal(MinesweeperUI.parseInput("x 1 1", publicData), null);
    assert.equal(MinesweeperUI.parseInput("r 1", publicData), null);
    assert.equal(MinesweeperUI.parseInput("r 3 0", publicData), null);
    assert.equal(MinesweeperUI.parseInput("constructor 1 1", publicData), null);
    assert.equal(MinesweeperUI.parseInput("tostring 0 0", {}), null);
    assert.deepEqual(MinesweeperUI.parseInput("r 3 0", {}), reveal(3, 0));
  });

  it("formats actions", () => {
    assert.equal(MinesweeperUI.formatAction(reveal(1, 2)), "reveal (1,2)");
    assert.equal(MinesweeperUI.formatAction(unflag(0, 3)), "unflag (0,3)");
    assert.equal(MinesweeperUI.formatAction(resign()), "resign");
  });
});
