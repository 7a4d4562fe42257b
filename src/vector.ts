// ═══════════════════════════════════════════════════════════════
//  Vector algebra — immutable 2-D / 3-D values
// ═══════════════════════════════════════════════════════════════

/** In-plane vector: position, velocity, electric field, force. */
export class Vector2 {
  constructor(readonly x: number, readonly y: number) {}

  static zero(): Vector2 {
    return new Vector2(0, 0);
  }

  static fromTuple([x, y]: readonly [number, number]): Vector2 {
    return new Vector2(x, y);
  }

  add(other: Vector2): Vector2 {
    return new Vector2(this.x + other.x, this.y + other.y);
  }

  sub(other: Vector2): Vector2 {
    return new Vector2(this.x - other.x, this.y - other.y);
  }

  scale(k: number): Vector2 {
    return new Vector2(this.x * k, this.y * k);
  }

  magnitude(): number {
    return Math.sqrt(this.x * this.x + this.y * this.y);
  }

  equals(other: Vector2): boolean {
    return this.x === other.x && this.y === other.y;
  }

  toTuple(): [number, number] {
    return [this.x, this.y];
  }
}

/** Full 3-D vector. Only magnetic fields use it; z is out of the plane. */
export class Vector3 {
  constructor(readonly x: number, readonly y: number, readonly z: number) {}

  static zero(): Vector3 {
    return new Vector3(0, 0, 0);
  }

  static fromTuple([x, y, z]: readonly [number, number, number]): Vector3 {
    return new Vector3(x, y, z);
  }

  add(other: Vector3): Vector3 {
    return new Vector3(this.x + other.x, this.y + other.y, this.z + other.z);
  }

  sub(other: Vector3): Vector3 {
    return new Vector3(this.x - other.x, this.y - other.y, this.z - other.z);
  }

  scale(k: number): Vector3 {
    return new Vector3(this.x * k, this.y * k, this.z * k);
  }

  magnitude(): number {
    return Math.sqrt(this.x * this.x + this.y * this.y + this.z * this.z);
  }

  toTuple(): [number, number, number] {
    return [this.x, this.y, this.z];
  }
}

/** k · v, for call sites that read better scalar-first. */
export function scaled(k: number, v: Vector2): Vector2 {
  return v.scale(k);
}
