import type { Vector2 } from "@/types";

/**
 * Vec2 - Pure utility functions for 2D vector operations
 * All functions are immutable and return new vectors
 */
export const Vec2 = {
  /**
   * Create a new vector
   */
  create(x: number, y: number): Vector2 {
    return { x, y };
  },

  /**
   * Subtract vector b from vector a
   */
  subtract(a: Vector2, b: Vector2): Vector2 {
    return { x: a.x - b.x, y: a.y - b.y };
  },

  /**
   * Calculate squared length of a vector
   */
  lengthSquared(v: Vector2): number {
    return v.x * v.x + v.y * v.y;
  },

  /**
   * Squared distance between two points, i.e. the squared displacement
   */
  distanceSquared(a: Vector2, b: Vector2): number {
    return Vec2.lengthSquared(Vec2.subtract(b, a));
  },

  /**
   * True when both components are finite numbers
   */
  isFinite(v: Vector2): boolean {
    return Number.isFinite(v.x) && Number.isFinite(v.y);
  },
};
