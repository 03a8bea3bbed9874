/**
 * Core type definitions for pairing-input-codec
 *
 * Context objects (PrimeField, extensions, curves, GroupOrder) are built
 * once per decode session from the head of the input and frozen. Elements
 * and points keep a plain reference back to the context that produced them.
 *
 * @module types
 */

/**
 * Supported limb counts (64-bit limbs)
 *
 * The representation of a field is selected at construction time from the
 * bit length of its modulus; moduli above 16 limbs are rejected.
 */
export type LimbCount = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14 | 15 | 16;

/**
 * Prime field built from a parsed modulus
 *
 * @example
 * ```typescript
 * const field = createPrimeField(23n, 1);
 * field.limbCount; // 1
 * field.byteLength; // 1
 * ```
 */
export interface PrimeField {
  /** The modulus p of the field F_p */
  readonly modulus: bigint;
  /** Byte length of the modulus as declared on the wire */
  readonly byteLength: number;
  /** Number of significant bits in the modulus */
  readonly bitLength: number;
  /** Number of 64-bit limbs needed to represent field elements */
  readonly limbCount: LimbCount;
}

/**
 * Element of a prime field
 *
 * Stored as frozen 64-bit limbs in little-endian order; the value is
 * always canonical (below the modulus).
 */
export interface FieldElement {
  /** The limbs storing the value (little-endian) */
  readonly limbs: readonly bigint[];
  /** The field this element belongs to */
  readonly field: PrimeField;
}

/**
 * Result of the Legendre symbol evaluation
 */
export enum LegendreSymbol {
  Zero = 0,
  QuadraticResidue = 1,
  QuadraticNonResidue = -1,
}

/**
 * Quadratic extension F_p[u] / (u^2 - nonResidue)
 */
export interface Fp2Extension {
  readonly degree: 2;
  readonly field: PrimeField;
  readonly nonResidue: FieldElement;
  /** nonResidue^((p^i - 1) / 2) for i = 0, 1 */
  readonly frobeniusCoeffsC1: readonly [FieldElement, FieldElement];
}

/**
 * Cubic extension F_p[u] / (u^3 - nonResidue)
 */
export interface Fp3Extension {
  readonly degree: 3;
  readonly field: PrimeField;
  readonly nonResidue: FieldElement;
  /** nonResidue^((p^i - 1) / 3) for i = 0, 1, 2 */
  readonly frobeniusCoeffsC1: readonly [FieldElement, FieldElement, FieldElement];
  /** nonResidue^((2p^i - 2) / 3) for i = 0, 1, 2 */
  readonly frobeniusCoeffsC2: readonly [FieldElement, FieldElement, FieldElement];
}

export type ExtensionField = Fp2Extension | Fp3Extension;

/**
 * Element c0 + c1·u of a quadratic extension
 */
export interface Fp2Element {
  readonly c0: FieldElement;
  readonly c1: FieldElement;
  readonly extension: Fp2Extension;
}

/**
 * Element c0 + c1·u + c2·u² of a cubic extension
 */
export interface Fp3Element {
  readonly c0: FieldElement;
  readonly c1: FieldElement;
  readonly c2: FieldElement;
  readonly extension: Fp3Extension;
}

/**
 * Order of the main subgroup, the modulus of the scalar field
 */
export interface GroupOrder {
  readonly value: bigint;
  /** Byte length of the order as declared on the wire; scalars use it too */
  readonly byteLength: number;
  /** The order as little-endian 64-bit limbs */
  readonly limbs: readonly bigint[];
}

/**
 * Scalar for point multiplication, always below its group order
 */
export interface Scalar {
  readonly value: bigint;
  /** Little-endian limbs, zero-extended to at least the order's limb count */
  readonly limbs: readonly bigint[];
  readonly order: GroupOrder;
}

/**
 * Short Weierstrass curve y² = x³ + a·x + b over the base field
 */
export interface WeierstrassCurve {
  readonly field: PrimeField;
  readonly a: FieldElement;
  readonly b: FieldElement;
  /** Main subgroup order, when the operation supplies one */
  readonly order?: GroupOrder;
}

/**
 * Twist y² = x³ + a·x + b over a quadratic extension
 */
export interface TwistCurveFp2 {
  readonly extension: Fp2Extension;
  readonly a: Fp2Element;
  readonly b: Fp2Element;
  readonly order?: GroupOrder;
}

/**
 * Twist y² = x³ + a·x + b over a cubic extension
 */
export interface TwistCurveFp3 {
  readonly extension: Fp3Extension;
  readonly a: Fp3Element;
  readonly b: Fp3Element;
  readonly order?: GroupOrder;
}

/**
 * Affine point on a base-field curve
 *
 * The encoding (0, 0) is the point at infinity.
 */
export interface G1Point {
  readonly x: FieldElement;
  readonly y: FieldElement;
  readonly isInfinity: boolean;
  readonly curve: WeierstrassCurve;
}

/**
 * Affine point on a quadratic twist
 */
export interface G2PointFp2 {
  readonly x: Fp2Element;
  readonly y: Fp2Element;
  readonly isInfinity: boolean;
  readonly curve: TwistCurveFp2;
}

/**
 * Affine point on a cubic twist
 */
export interface G2PointFp3 {
  readonly x: Fp3Element;
  readonly y: Fp3Element;
  readonly isInfinity: boolean;
  readonly curve: TwistCurveFp3;
}
