import {
  advanceExpand,
  advanceShrink,
  beginShrink,
  canExpand,
  canShrink,
  countShellPoints,
  firstExpandBounds,
  prepareShells,
  traverseShells,
  type ShellBounds,
  type ShellOrder
} from "@voxgrid/iterator";

export interface ShellStats {
  positive: number;
  negative: number;
  points: number;
}

export interface ShellSummary {
  size: number;
  order: ShellOrder;
  centerPoints: number;
  shells: ShellStats[];
  total: number;
}

export function isShellOrder(value: unknown): value is ShellOrder {
  return value === "expand" || value === "shrink";
}

/** Shells in traversal order, without visiting their points. */
export function summarizeShells(size: number, order: ShellOrder): ShellSummary {
  const layout = prepareShells(size);
  const centerPoints = layout.isEven ? (layout.positive - layout.center) ** 3 : 1;
  const shells: ShellStats[] = [];
  const record = (bounds: ShellBounds): void => {
    shells.push({
      positive: bounds.positive,
      negative: bounds.negative,
      points: countShellPoints(bounds.positive, bounds.negative)
    });
  };

  if (order === "expand") {
    const bounds = firstExpandBounds(layout);
    while (canExpand(size, bounds)) {
      record(bounds);
      advanceExpand(bounds);
    }
  } else {
    const bounds = beginShrink(size);
    while (canShrink(bounds)) {
      record(bounds);
      advanceShrink(bounds);
    }
  }

  const total = centerPoints + shells.reduce((sum, shell) => sum + shell.points, 0);
  return { size, order, centerPoints, shells, total };
}

export function listShellPoints(size: number, order: ShellOrder): string[] {
  const lines: string[] = [];
  traverseShells((x, y, z) => lines.push(`${x},${y},${z}`), size, order);
  return lines;
}
