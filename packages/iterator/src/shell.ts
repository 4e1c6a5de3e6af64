/**
 * Concentric-shell traversal of an N x N x N volume.
 *
 * A shell is the surface of the sub-cube spanning [negative, positive] on
 * every axis. Expanding traversal visits the center region first and then
 * each enclosing shell; shrinking traversal visits the outermost shell first
 * and the center region last. Every point of the volume is visited once.
 */

export type ShellVisitor = (x: number, y: number, z: number) => void;

export interface ShellLayout {
  center: number;
  positive: number;
  isEven: boolean;
}

/** Current shell bounds, advanced in place. */
export interface ShellBounds {
  positive: number;
  negative: number;
}

export type ShellOrder = "expand" | "shrink";

function assertSize(size: number): void {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Shell volume size must be a positive integer, got ${String(size)}`);
  }
}

/**
 * Center point and first shell bound. For even sizes the center region is
 * the cube [center, positive - 1], a single point otherwise.
 */
export function prepareShells(size: number): ShellLayout {
  assertSize(size);
  const isEven = size % 2 === 0;
  let center = Math.floor(size / 2);
  if (isEven) center -= 1;
  return { center, positive: isEven ? center + 2 : center + 1, isEven };
}

/** Visits the surface of the cube [negative, positive]^3. */
export function visitShellLayer(visit: ShellVisitor, positive: number, negative: number): void {
  const negativeOne = negative + 1;
  const positiveOne = positive - 1;

  // X*Y layers.
  for (let y = negative; y <= positive; y++) {
    for (let x = negative; x <= positive; x++) visit(x, y, negative);
  }
  for (let y = negative; y <= positive; y++) {
    for (let x = negative; x <= positive; x++) visit(x, y, positive);
  }

  // X*Z layers, without the rows the X*Y layers covered.
  for (let z = negativeOne; z <= positiveOne; z++) {
    for (let x = negative; x <= positive; x++) visit(x, negative, z);
  }
  for (let z = negativeOne; z <= positiveOne; z++) {
    for (let x = negative; x <= positive; x++) visit(x, positive, z);
  }

  // Y*Z layers, without the edges already covered.
  for (let z = negativeOne; z <= positiveOne; z++) {
    for (let y = negativeOne; y <= positiveOne; y++) visit(negative, y, z);
  }
  for (let z = negativeOne; z <= positiveOne; z++) {
    for (let y = negativeOne; y <= positiveOne; y++) visit(positive, y, z);
  }
}

export function visitShellCenter(visit: ShellVisitor, center: number, positive: number, isEven: boolean): void {
  if (!isEven) {
    visit(center, center, center);
    return;
  }
  for (let z = center; z < positive; z++) {
    for (let y = center; y < positive; y++) {
      for (let x = center; x < positive; x++) visit(x, y, z);
    }
  }
}

/** Number of points `visitShellLayer` visits for the given bounds. */
export function countShellPoints(positive: number, negative: number): number {
  const side = positive - negative + 1;
  const inner = Math.max(side - 2, 0);
  return side ** 3 - inner ** 3;
}

/** Bounds of the first shell around the center region. */
export function firstExpandBounds(layout: ShellLayout): ShellBounds {
  return { positive: layout.positive, negative: layout.center - 1 };
}

export function beginExpand(visit: ShellVisitor, size: number): ShellBounds {
  const layout = prepareShells(size);
  visitShellCenter(visit, layout.center, layout.positive, layout.isEven);
  return firstExpandBounds(layout);
}

export function canExpand(size: number, bounds: ShellBounds): boolean {
  return bounds.positive < size;
}

export function advanceExpand(bounds: ShellBounds): void {
  bounds.positive++;
  bounds.negative--;
}

export function expandShells(visit: ShellVisitor, size: number): void {
  const bounds = beginExpand(visit, size);
  while (canExpand(size, bounds)) {
    visitShellLayer(visit, bounds.positive, bounds.negative);
    advanceExpand(bounds);
  }
}

export function beginShrink(size: number): ShellBounds {
  assertSize(size);
  return { positive: size - 1, negative: 0 };
}

export function canShrink(bounds: ShellBounds): boolean {
  return bounds.positive - bounds.negative > 1;
}

export function advanceShrink(bounds: ShellBounds): void {
  bounds.positive--;
  bounds.negative++;
}

export function endShrink(visit: ShellVisitor, size: number): void {
  const { center, positive, isEven } = prepareShells(size);
  visitShellCenter(visit, center, positive, isEven);
}

export function shrinkShells(visit: ShellVisitor, size: number): void {
  const bounds = beginShrink(size);
  while (canShrink(bounds)) {
    visitShellLayer(visit, bounds.positive, bounds.negative);
    advanceShrink(bounds);
  }
  endShrink(visit, size);
}

export function traverseShells(visit: ShellVisitor, size: number, order: ShellOrder): void {
  if (order === "expand") {
    expandShells(visit, size);
  } else {
    shrinkShells(visit, size);
  }
}
