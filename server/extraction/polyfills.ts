/**
 * Polyfills required for pdfjs-dist in Node.js environment.
 *
 * IMPORTANT: This file must be imported BEFORE pdfjs-dist is loaded anywhere.
 * It sets up a global DOMMatrix, which pdfjs-dist expects at load time.
 * Only 2D affine operations are modelled.
 */

type Affine = [number, number, number, number, number, number];

function multiplyAffine(m: Affine, n: Affine): Affine {
  return [
    m[0] * n[0] + m[2] * n[1],
    m[1] * n[0] + m[3] * n[1],
    m[0] * n[2] + m[2] * n[3],
    m[1] * n[2] + m[3] * n[3],
    m[0] * n[4] + m[2] * n[5] + m[4],
    m[1] * n[4] + m[3] * n[5] + m[5],
  ];
}

if (!("DOMMatrix" in globalThis)) {
  class DOMMatrix {
    a = 1; b = 0; c = 0; d = 1; e = 0; f = 0;
    is2D = true;

    constructor(init?: number[] | string) {
      if (Array.isArray(init) && init.length === 6) {
        [this.a, this.b, this.c, this.d, this.e, this.f] = init;
      }
    }

    get isIdentity(): boolean {
      return this.a === 1 && this.b === 0 && this.c === 0 && this.d === 1 && this.e === 0 && this.f === 0;
    }

    private toAffine(): Affine {
      return [this.a, this.b, this.c, this.d, this.e, this.f];
    }

    multiply(other: DOMMatrix) { return new DOMMatrix(multiplyAffine(this.toAffine(), other.toAffine())); }
    translate(tx = 0, ty = 0) { return this.multiply(new DOMMatrix([1, 0, 0, 1, tx, ty])); }
    scale(sx = 1, sy = sx) { return this.multiply(new DOMMatrix([sx, 0, 0, sy, 0, 0])); }

    inverse() {
      const det = this.a * this.d - this.b * this.c;
      if (det === 0) return new DOMMatrix([NaN, NaN, NaN, NaN, NaN, NaN]);
      return new DOMMatrix([
        this.d / det,
        -this.b / det,
        -this.c / det,
        this.a / det,
        (this.c * this.f - this.d * this.e) / det,
        (this.b * this.e - this.a * this.f) / det,
      ]);
    }

    transformPoint(point: { x: number; y: number }) {
      return {
        x: this.a * point.x + this.c * point.y + this.e,
        y: this.b * point.x + this.d * point.y + this.f,
        z: 0,
        w: 1,
      };
    }
  }
  Object.defineProperty(globalThis, "DOMMatrix", { value: DOMMatrix, writable: true, configurable: true });
}

// Export nothing - this is a side-effect-only module
export {};
