/**
 * Color coordination for stacks
 */

import pc from 'picocolors';

// Available colors for stack visualization
const STACK_COLORS = ['cyan', 'magenta', 'yellow', 'green', 'blue', 'red'] as const;

type ColorName = (typeof STACK_COLORS)[number];

export class ColorManager {
  private stackColors = new Map<string, ColorName>();
  private usedColors = new Set<ColorName>();

  /**
   * Get color function for a stack root
   */
  getColorForStack(stackRoot: string): (text: string) => string {
    let colorName = this.stackColors.get(stackRoot);

    if (!colorName) {
      colorName = this.assignColor(stackRoot);
      this.stackColors.set(stackRoot, colorName);
    }

    return getColorFunction(colorName);
  }

  /**
   * Hash the root name to a color; fall back to the first unused one on collision
   */
  private assignColor(stackRoot: string): ColorName {
    const color = STACK_COLORS[hashString(stackRoot) % STACK_COLORS.length];
    if (!this.usedColors.has(color)) {
      this.usedColors.add(color);
      return color;
    }

    for (const c of STACK_COLORS) {
      if (!this.usedColors.has(c)) {
        this.usedColors.add(c);
        return c;
      }
    }

    // All colors used, cycle back
    return color;
  }
}

function hashString(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    hash = (hash << 5) - hash + str.charCodeAt(i);
    hash = hash & hash; // Convert to 32-bit integer
  }
  return Math.abs(hash);
}

function getColorFunction(colorName: ColorName): (text: string) => string {
  switch (colorName) {
    case 'cyan':
      return pc.cyan;
    case 'magenta':
      return pc.magenta;
    case 'yellow':
      return pc.yellow;
    case 'green':
      return pc.green;
    case 'blue':
      return pc.blue;
    case 'red':
      return pc.red;
  }
}
