/**
 * Tests for the type-safe angle library
 */

import { describe, it, expect, beforeEach } from "vitest";
import { config, ZeroInit } from "@numeris/core";
import {
  Angle,
  Deg,
  Rad,
  Degd,
  Radd,
  deg,
  rad,
  degd,
  radd,
  fuzzyEquals,
  epsilonOf,
} from "../index.js";

beforeEach(() => {
  config.reset();
});

describe("Angle construction", () => {
  it("should default to zero", () => {
    expect(Deg.of().toUnderlying()).toBe(0);
    expect(Radd.of(ZeroInit).toUnderlying()).toBe(0);
  });

  it("should wrap an explicit unitless value", () => {
    const angle = deg(45);
    expect(angle.toUnderlying()).toBe(45);
    expect(angle.unit).toBe("deg");
    expect(angle.precision).toBe("float");
  });

  it("should store float angles in single precision", () => {
    expect(deg(0.1).toUnderlying()).toBe(Math.fround(0.1));
    expect(degd(0.1).toUnderlying()).toBe(0.1);
  });

  it("should describe each variant", () => {
    expect([Deg.name, Rad.name, Degd.name, Radd.name]).toEqual(["Deg", "Rad", "Degd", "Radd"]);
    expect(Radd.unit).toBe("rad");
    expect(Radd.precision).toBe("double");
  });

  it("should clone into an independent value", () => {
    const a = deg(10);
    const b = a.clone();
    b.addAssign(deg(1));
    expect(a.toUnderlying()).toBe(10);
    expect(b.toUnderlying()).toBe(11);
  });
});

describe("unit conversions", () => {
  it("should convert 180 degrees to pi radians", () => {
    expect(degd(180).toRad().toUnderlying()).toBeCloseTo(Math.PI, 12);
    expect(deg(180).toRad().toUnderlying()).toBe(Math.fround(Math.PI));
  });

  it("should convert radians to degrees", () => {
    expect(rad(Math.PI).toDeg().toUnderlying()).toBe(180);
    expect(Degd.from(radd(Math.PI / 2)).toUnderlying()).toBeCloseTo(90, 12);
  });

  it("should convert through the kind constructors", () => {
    expect(Rad.from(deg(90)).toUnderlying()).toBe(Math.fround(Math.PI / 2));
    expect(Deg.from(rad(Math.PI)).toUnderlying()).toBe(180);
  });

  it("should round-trip degrees through radians", () => {
    for (const x of [0, 1, 45, -90, 123.456, 359.5, 720]) {
      expect(deg(x).toRad().toDeg().equals(deg(x))).toBe(true);
      expect(degd(x).toRad().toDeg().equals(degd(x))).toBe(true);
    }
  });

  it("should round-trip radians through degrees", () => {
    for (const x of [0, 0.5, 1, Math.PI, -2.5, 10]) {
      expect(rad(x).toDeg().toRad().equals(rad(x))).toBe(true);
      expect(radd(x).toDeg().toRad().equals(radd(x))).toBe(true);
    }
  });
});

describe("precision conversions", () => {
  it("should widen float to double without changing the value", () => {
    const wide = deg(0.1).toDouble();
    expect(wide.precision).toBe("double");
    expect(wide.toUnderlying()).toBe(Math.fround(0.1));
    expect(Degd.from(deg(0.1)).toUnderlying()).toBe(Math.fround(0.1));
  });

  it("should narrow double to float", () => {
    expect(degd(0.1).toFloat().toUnderlying()).toBe(Math.fround(0.1));
    expect(Rad.from(radd(0.1)).toUnderlying()).toBe(Math.fround(0.1));
  });

  it("should convert unit and precision together", () => {
    expect(Deg.from(radd(Math.PI)).toUnderlying()).toBe(180);
    const r = Radd.from(deg(90));
    expect(r.precision).toBe("double");
    expect(r.toUnderlying()).toBe(Math.fround(Math.PI / 2));
  });

  it("should copy when converting from the same variant", () => {
    const a = deg(5);
    const b = Deg.from(a);
    expect(b).not.toBe(a);
    expect(b.toUnderlying()).toBe(5);
  });
});

describe("comparison", () => {
  it("should compare values of the same variant", () => {
    expect(deg(0).equals(deg(0))).toBe(true);
    expect(deg(1).lessThan(deg(2))).toBe(true);
    expect(deg(1).greaterThan(deg(2))).toBe(false);
    expect(deg(1).notEquals(deg(2))).toBe(true);
    expect(deg(1).lessThanOrEqual(deg(1))).toBe(true);
    expect(deg(2).greaterThanOrEqual(deg(1))).toBe(true);
    expect(deg(1).greaterThanOrEqual(deg(2))).toBe(false);
  });

  it("should treat nearly-equal values as equal", () => {
    expect(degd(1).equals(degd(1 + 1e-15))).toBe(true);
    expect(degd(1).equals(degd(1.0001))).toBe(false);
    expect(deg(1000).equals(deg(1000.001))).toBe(true);
    expect(deg(0).equals(deg(1e-6))).toBe(true);
    expect(deg(0).equals(deg(1e-4))).toBe(false);
  });

  it("should never consider NaN equal", () => {
    expect(deg(NaN).equals(deg(NaN))).toBe(false);
  });

  it("should sort with compare", () => {
    const sorted = [deg(30), deg(-10), deg(20)].sort((a, b) => a.compare(b));
    expect(sorted.map((a) => a.toUnderlying())).toEqual([-10, 20, 30]);
    expect(rad(1).compare(rad(1))).toBe(0);
  });
});

describe("arithmetic", () => {
  it("should add, subtract and negate", () => {
    expect(deg(30).add(deg(15)).toUnderlying()).toBe(45);
    expect(deg(30).sub(deg(15)).toUnderlying()).toBe(15);
    expect(deg(30).neg().toUnderlying()).toBe(-30);
  });

  it("should leave the operands untouched", () => {
    const a = deg(30);
    a.add(deg(15));
    a.mul(2);
    expect(a.toUnderlying()).toBe(30);
  });

  it("should scale by unitless numbers", () => {
    expect(deg(10).mul(3).toUnderlying()).toBe(30);
    expect(deg(10).div(4).toUnderlying()).toBe(2.5);
  });

  it("should return a bare ratio when dividing two angles", () => {
    const ratio = deg(90).div(deg(30));
    expect(typeof ratio).toBe("number");
    expect(ratio).toBe(3);
    expect(deg(1).div(deg(3))).toBe(Math.fround(1 / 3));
    expect(degd(1).div(degd(3))).toBe(1 / 3);
  });

  it("should compute in the angle's precision", () => {
    const f = Math.fround;
    expect(deg(0.1).add(deg(0.2)).toUnderlying()).toBe(f(f(0.1) + f(0.2)));
    expect(degd(0.1).add(degd(0.2)).toUnderlying()).toBe(0.1 + 0.2);
  });

  it("should recover the first operand of (a + b) - b", () => {
    const pairs: Array<[number, number]> = [
      [1, 2],
      [45.5, -12.25],
      [1000, 0.001],
    ];
    for (const [x, y] of pairs) {
      expect(deg(x).add(deg(y)).sub(deg(y)).equals(deg(x))).toBe(true);
      expect(radd(x).add(radd(y)).sub(radd(y)).equals(radd(x))).toBe(true);
    }
  });

  it("should mutate only the receiver in compound assignments", () => {
    const a = deg(10);
    const b = deg(5);
    expect(a.addAssign(b)).toBe(a);
    expect(a.toUnderlying()).toBe(15);
    a.subAssign(deg(3)).mulAssign(2).divAssign(8);
    expect(a.toUnderlying()).toBe(3);
    expect(b.toUnderlying()).toBe(5);
  });

  it("should follow IEEE-754 for division by zero", () => {
    expect(deg(1).div(0).toUnderlying()).toBe(Infinity);
    expect(degd(-1).div(0).toUnderlying()).toBe(-Infinity);
    expect(deg(0).div(0).toUnderlying()).toBeNaN();
    expect(deg(1).div(deg(0))).toBe(Infinity);
  });
});

describe("rendering", () => {
  it("should render the variant name and value", () => {
    expect(deg(45).toString()).toBe("Deg(45)");
    expect(degd(45).toString()).toBe("Degd(45)");
    expect(`${rad(Math.PI)}`).toBe("Rad(3.14159)");
    expect(radd(Math.PI).toString()).toBe("Radd(3.14159265358979)");
    expect(Rad.from(deg(90)).toString()).toBe("Rad(1.5708)");
  });

  it("should switch to exponent form for very small and large values", () => {
    expect(deg(1e-5).toString()).toBe("Deg(1e-05)");
    expect(degd(2.5e20).toString()).toBe("Degd(2.5e+20)");
    expect(deg(-0.25).toString()).toBe("Deg(-0.25)");
  });

  it("should honour the configured digits", () => {
    config.set({ format: { floatDigits: 3 } });
    expect(deg(12.345).toString()).toBe("Deg(12.3)");
    expect(degd(12.345).toString()).toBe("Degd(12.345)");
  });
});

describe("type safety", () => {
  it("should reject mixing units and precisions at compile time", () => {
    const d = deg(1);
    // @ts-expect-error: cannot add degrees and radians
    d.add(rad(1));
    // @ts-expect-error: cannot compare float and double angles
    d.lessThan(degd(1));
    // @ts-expect-error: radians have no toRad()
    rad(1).toRad();
    // @ts-expect-error: toFloat() only exists on double angles
    d.toFloat();
    expect(d.toUnderlying()).toBe(1);
  });

  it("should not accept a bare number as an angle", () => {
    // @ts-expect-error: a bare number is not an angle
    const bare: Deg = 1;
    expect(bare).toBe(1);
  });

  it("should build any variant through the class constructor", () => {
    const angle = new Angle("rad", "double", 2);
    expect(angle.toString()).toBe("Radd(2)");
  });
});

describe("fuzzyEquals", () => {
  it("should use the precision's epsilon", () => {
    expect(epsilonOf("float")).toBe(1e-5);
    expect(epsilonOf("double")).toBe(1e-14);
    expect(fuzzyEquals(Infinity, Infinity, 1e-5)).toBe(true);
    expect(fuzzyEquals(Infinity, 1, 1e-5)).toBe(false);
    expect(fuzzyEquals(1e-6, -1e-6, 1e-5)).toBe(true);
  });
});
