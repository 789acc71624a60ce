// =============================================================================
// Bin Packing Algorithm (guillotine free rectangles, Best Short Side Fit)
// =============================================================================

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface RectCandidate {
  width: number;
  height: number;
}

export interface RectPosition {
  /** Index into the candidate list that won */
  candidate: number;
  x: number;
  y: number;
}

/**
 * One page worth of free space. Positions are relative to the bin origin.
 */
export class PageBin {
  private freeRectangles: Rect[];

  constructor(readonly width: number, readonly height: number, private readonly epsilon = 0) {
    this.freeRectangles = [{ x: 0, y: 0, width, height }];
  }

  get freeRects(): readonly Rect[] {
    return this.freeRectangles;
  }

  /**
   * Best position over every candidate size, or null when none fits.
   * Earlier candidates win ties.
   */
  findPosition(candidates: RectCandidate[]): RectPosition | null {
    let bestScore = Infinity;
    let best: RectPosition | null = null;

    for (let candidate = 0; candidate < candidates.length; candidate++) {
      const size = candidates[candidate];
      for (const freeRect of this.freeRectangles) {
        if (size.width > freeRect.width + this.epsilon || size.height > freeRect.height + this.epsilon) continue;
        const leftover = Math.min(freeRect.width - size.width, freeRect.height - size.height);
        if (leftover < bestScore) {
          bestScore = leftover;
          best = { candidate, x: freeRect.x, y: freeRect.y };
        }
      }
    }

    return best;
  }

  /**
   * Claim a rectangle previously returned by findPosition
   */
  place(x: number, y: number, usedWidth: number, usedHeight: number): void {
    const index = this.freeRectangles.findIndex(r => r.x === x && r.y === y &&
      usedWidth <= r.width + this.epsilon && usedHeight <= r.height + this.epsilon);
    if (index === -1) {
      throw new Error(`No free rectangle at (${x}, ${y}) holds ${usedWidth} x ${usedHeight}`);
    }
    const [rect] = this.freeRectangles.splice(index, 1);

    // Right remainder
    if (usedWidth < rect.width) {
      this.freeRectangles.push({
        x: rect.x + usedWidth,
        y: rect.y,
        width: rect.width - usedWidth,
        height: rect.height,
      });
    }

    // Top remainder
    if (usedHeight < rect.height) {
      this.freeRectangles.push({
        x: rect.x,
        y: rect.y + usedHeight,
        width: usedWidth,
        height: rect.height - usedHeight,
      });
    }

    this.pruneFreeRectangles();
  }

  private pruneFreeRectangles(): void {
    // Remove rectangles that are fully contained in other rectangles
    for (let i = 0; i < this.freeRectangles.length; i++) {
      for (let j = i + 1; j < this.freeRectangles.length; j++) {
        if (isContainedIn(this.freeRectangles[i], this.freeRectangles[j])) {
          this.freeRectangles.splice(i, 1);
          i--;
          break;
        }
        if (isContainedIn(this.freeRectangles[j], this.freeRectangles[i])) {
          this.freeRectangles.splice(j, 1);
          j--;
        }
      }
    }
  }
}

function isContainedIn(a: Rect, b: Rect): boolean {
  return a.x >= b.x && a.y >= b.y &&
         a.x + a.width <= b.x + b.width &&
         a.y + a.height <= b.y + b.height;
}
