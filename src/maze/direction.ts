/**
 * Compass direction encoded as the passage bit it owns in a cell mask.
 *
 *   UP    = 0b0001
 *   RIGHT = 0b0010
 *   DOWN  = 0b0100
 *   LEFT  = 0b1000
 */
export const Direction = {
  UP: 0b0001,
  RIGHT: 0b0010,
  DOWN: 0b0100,
  LEFT: 0b1000,
} as const;

export type Direction = (typeof Direction)[keyof typeof Direction];

/** Enumeration order used for every neighbour listing. */
export const DIRECTIONS: readonly Direction[] = [
  Direction.UP,
  Direction.RIGHT,
  Direction.DOWN,
  Direction.LEFT,
];

/** Bitmask with every passage open. */
export const ALL_PASSAGES = 0b1111;

/** Grid coordinate `[x, y]`. */
export type Coordinate = readonly [x: number, y: number];

/** Letter written to a solution trace for each direction. */
export type TraceLetter = 'U' | 'R' | 'D' | 'L';

const OFFSETS: Record<Direction, readonly [number, number]> = {
  [Direction.UP]: [0, -1],
  [Direction.RIGHT]: [1, 0],
  [Direction.DOWN]: [0, 1],
  [Direction.LEFT]: [-1, 0],
};

const OPPOSITES: Record<Direction, Direction> = {
  [Direction.UP]: Direction.DOWN,
  [Direction.RIGHT]: Direction.LEFT,
  [Direction.DOWN]: Direction.UP,
  [Direction.LEFT]: Direction.RIGHT,
};

const LETTERS: Record<Direction, TraceLetter> = {
  [Direction.UP]: 'U',
  [Direction.RIGHT]: 'R',
  [Direction.DOWN]: 'D',
  [Direction.LEFT]: 'L',
};

/** The direction pointing the other way. */
export function opposite(direction: Direction): Direction {
  return OPPOSITES[direction];
}

/**
 * Coordinate one step from `(x, y)` toward `direction`.
 *
 * No bounds are applied: travelling UP from row 0 yields `y = -1`. Callers
 * that go on to touch the grid must check the result first.
 */
export function travel(direction: Direction, x: number, y: number): Coordinate {
  const [dx, dy] = OFFSETS[direction];
  return [x + dx, y + dy];
}

/** Direction leading from `from` to `to`, or `undefined` unless they are grid-adjacent. */
export function stepDirection(
  from: Coordinate,
  to: Coordinate
): Direction | undefined {
  const dx = to[0] - from[0];
  const dy = to[1] - from[1];
  return DIRECTIONS.find((direction) => {
    const [ox, oy] = OFFSETS[direction];
    return ox === dx && oy === dy;
  });
}

/**
 * Direction leading from `from` to the grid-adjacent `to`.
 *
 * @throws {RangeError} when the coordinates are not adjacent.
 */
export function between(from: Coordinate, to: Coordinate): Direction {
  const direction = stepDirection(from, to);
  if (direction === undefined) {
    throw new RangeError(
      `(${from[0]},${from[1]}) and (${to[0]},${to[1]}) are not adjacent`
    );
  }
  return direction;
}

/** Trace letter for `direction`. */
export function toTraceLetter(direction: Direction): TraceLetter {
  return LETTERS[direction];
}

/** Direction for a trace letter, or `undefined` for any other character. */
export function fromTraceLetter(letter: string): Direction | undefined {
  return DIRECTIONS.find((direction) => LETTERS[direction] === letter);
}

/** Whether `mask` has the passage bit for `direction` set. */
export function hasPassage(mask: number, direction: Direction): boolean {
  return (mask & direction) !== 0;
}
