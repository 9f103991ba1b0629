/** PCG-DXSM generator position: a 128-bit LCG state and its odd stream increment. */
export interface Rng {
  readonly state: bigint;
  readonly increment: bigint;
}

export type Player = 'black' | 'white';

export const PLAYERS = ['black', 'white'] as const satisfies readonly Player[];

export interface Point {
  readonly row: number;
  readonly col: number;
}

export interface BoardSize {
  readonly rows: number;
  readonly cols: number;
}

export type Move =
  | { readonly kind: 'play'; readonly point: Point }
  | { readonly kind: 'pass' }
  | { readonly kind: 'resign' };

export type MoveKind = Move['kind'];

/**
 * Stones and liberties are dense point indices (`encodePoint`); convert them
 * with `ReadonlyBoard.pointsOf` or `ReadonlyBoard.pointAt`.
 */
export interface Group {
  readonly color: Player;
  readonly stones: ReadonlySet<number>;
  readonly liberties: ReadonlySet<number>;
}

/**
 * Read surface of a board. Game states hand this out so callers cannot place
 * stones on a board another state still references.
 */
export interface ReadonlyBoard {
  readonly rows: number;
  readonly cols: number;
  isOnGrid(point: Point): boolean;
  indexOf(point: Point): number;
  pointAt(index: number): Point;
  /** Points for a set of indices, such as a group's stones, in row-major order. */
  pointsOf(indices: Iterable<number>): readonly Point[];
  stones(): IterableIterator<readonly [Point, Player]>;
  get(point: Point): Player | null;
  getGroup(point: Point): Group | null;
  positionHash(): bigint;
  neighbors(point: Point): readonly Point[];
  corners(point: Point): readonly Point[];
  isSelfCapture(player: Player, point: Point): boolean;
  willCapture(player: Player, point: Point): boolean;
  /** Copy of this board with `player` placed at `point`, captures resolved. */
  withStone(player: Player, point: Point): ReadonlyBoard;
}

export interface Situation {
  readonly player: Player;
  readonly hash: bigint;
}

export interface GameState {
  readonly board: ReadonlyBoard;
  readonly nextPlayer: Player;
  readonly previous: GameState | null;
  readonly lastMove: Move | null;
  readonly seenSituations: SituationSet;
  readonly komi: number;
  readonly moveCount: number;
  readonly turnOverrideLimit?: number;
  readonly turnIndex?: number;
}

export interface SituationSet {
  readonly size: number;
  has(situation: Situation): boolean;
  with(situation: Situation): SituationSet;
}

export interface Territory {
  readonly blackStones: number;
  readonly whiteStones: number;
  readonly blackTerritory: number;
  readonly whiteTerritory: number;
  readonly dame: number;
  readonly damePoints: readonly Point[];
}

export interface GameResult {
  readonly black: number;
  readonly white: number;
  readonly komi: number;
  readonly winner: Player;
  readonly winningMargin: number;
}

export type GameOutcome =
  | { readonly kind: 'resignation'; readonly winner: Player; readonly resigned: Player }
  | { readonly kind: 'score'; readonly winner: Player; readonly result: GameResult; readonly territory: Territory };

export type IllegalMoveReason = 'gameOver' | 'pointOffGrid' | 'pointOccupied' | 'selfCapture' | 'superko';

export interface MoveLog {
  readonly player: Player;
  readonly move: Move;
  readonly positionHash: bigint;
  readonly legalMoveCount: number;
}

export type SimulationStopReason = 'terminal' | 'maxMoves';

export interface GameTrace {
  readonly seed: number;
  readonly moves: readonly MoveLog[];
  readonly finalState: GameState;
  readonly outcome: GameOutcome | null;
  readonly stopReason: SimulationStopReason;
}

export interface Agent {
  chooseMove(input: {
    readonly state: GameState;
    readonly player: Player;
    readonly legalMoves: readonly Move[];
    readonly rng: Rng;
  }): { readonly move: Move; readonly rng: Rng };
}
