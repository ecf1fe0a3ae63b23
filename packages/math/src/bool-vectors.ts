import { boolVectorOf, type BoolVector, type BoolVectorKind } from "@numeris/bool-vector";

/** Two-component bool vector */
export const BoolVector2: BoolVectorKind<2> = boolVectorOf(2);
export type BoolVector2 = BoolVector<2>;

/** Three-component bool vector */
export const BoolVector3: BoolVectorKind<3> = boolVectorOf(3);
export type BoolVector3 = BoolVector<3>;

/** Four-component bool vector */
export const BoolVector4: BoolVectorKind<4> = boolVectorOf(4);
export type BoolVector4 = BoolVector<4>;
