import { z } from 'zod';

import { kernelRuntimeError } from './runtime-error.js';
import type { BoardSize } from './types.js';

export const MIN_BOARD_DIMENSION = 2;
export const MAX_BOARD_DIMENSION = 25;

const BoardDimensionSchema = z.number().int().min(MIN_BOARD_DIMENSION).max(MAX_BOARD_DIMENSION);

export const BoardSizeSchema = z.union([
  BoardDimensionSchema.transform((size): BoardSize => ({ rows: size, cols: size })),
  z.object({ rows: BoardDimensionSchema, cols: BoardDimensionSchema }).strict(),
]);

export const KomiSchema = z.union([z.number().finite(), z.literal('default'), z.literal(false)]);

export const GameOptionsSchema = z
  .object({
    komi: KomiSchema.default('default'),
    turnOverrideLimit: z.number().int().nonnegative().optional(),
  })
  .strict();

export type BoardSizeInput = z.input<typeof BoardSizeSchema>;
export type GameOptions = z.input<typeof GameOptionsSchema>;
export type Komi = z.infer<typeof KomiSchema>;

export interface GameConfig {
  readonly size: BoardSize;
  readonly komi: number;
  readonly turnOverrideLimit?: number;
}

/** Default komi is keyed on the first board dimension only. */
export const defaultKomi = (size: BoardSize): number => {
  if (size.rows === 9) {
    return 5.5;
  }
  if (size.rows === 13) {
    return 6.5;
  }
  return 7.5;
};

export const resolveKomi = (komi: Komi, size: BoardSize): number => {
  if (komi === false) {
    return 0;
  }
  return komi === 'default' ? defaultKomi(size) : komi;
};

const formatIssues = (error: z.ZodError): readonly string[] =>
  error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`);

export const parseGameConfig = (boardSize: BoardSizeInput, options: GameOptions = {}): GameConfig => {
  const size = BoardSizeSchema.safeParse(boardSize);
  const parsedOptions = GameOptionsSchema.safeParse(options);
  const issues = [
    ...(size.success ? [] : formatIssues(size.error).map((issue) => `boardSize ${issue}`)),
    ...(parsedOptions.success ? [] : formatIssues(parsedOptions.error)),
  ];

  if (!size.success || !parsedOptions.success) {
    throw kernelRuntimeError('INVALID_GAME_CONFIG', `Invalid game configuration: ${issues.join('; ')}`, { issues });
  }

  const { komi, turnOverrideLimit } = parsedOptions.data;
  return {
    size: size.data,
    komi: resolveKomi(komi, size.data),
    ...(turnOverrideLimit === undefined || turnOverrideLimit === 0 ? {} : { turnOverrideLimit }),
  };
};
