/**
 * Render a number the way `printf("%.<digits>g")` does: fixed notation
 * unless the decimal exponent is below -4 or at least `digits`, trailing
 * zeros dropped, exponent written with a sign and at least two digits.
 * Halfway cases round to even and negative zero keeps its sign.
 *
 * @example
 * formatScalar(45, 6)          // "45"
 * formatScalar(Math.PI, 6)     // "3.14159"
 * formatScalar(0.00001, 6)     // "1e-05"
 * formatScalar(2.5, 1)         // "2"
 */
export function formatScalar(value: number, digits: number): string {
  if (!Number.isFinite(value)) return String(value);

  const precision = Math.min(21, Math.max(1, Math.trunc(digits)));
  const sign = value < 0 || Object.is(value, -0) ? "-" : "";
  const { significand, exponent } = roundToDigits(Math.abs(value), precision);

  if (exponent < -4 || exponent >= precision) {
    const mantissa = stripZeros(`${significand[0]}.${significand.slice(1)}`);
    const exponentSign = exponent < 0 ? "-" : "+";
    const magnitude = String(Math.abs(exponent)).padStart(2, "0");
    return `${sign}${mantissa}e${exponentSign}${magnitude}`;
  }

  if (exponent < 0) {
    return `${sign}${stripZeros(`0.${"0".repeat(-exponent - 1)}${significand}`)}`;
  }
  const whole = significand.slice(0, exponent + 1);
  const fraction = significand.slice(exponent + 1);
  return `${sign}${fraction ? stripZeros(`${whole}.${fraction}`) : whole}`;
}

interface Rounded {
  /** Exactly `precision` decimal digits, the first one before the point */
  significand: string;
  exponent: number;
}

function splitExponential(text: string): Rounded {
  const [mantissa, exponentText] = text.split("e");
  return { significand: mantissa.replace(".", ""), exponent: Number(exponentText) };
}

/**
 * Round a non-negative finite value to `precision` significant digits.
 *
 * `toExponential` breaks ties away from zero. An exact tie is detected on the
 * full decimal expansion and rounded to the even digit instead.
 */
function roundToDigits(magnitude: number, precision: number): Rounded {
  const exact = splitExponential(magnitude.toExponential(100));
  const dropped = exact.significand.slice(precision);
  const isTie = /^50*$/.test(dropped);
  const lastKept = Number(exact.significand[precision - 1]);

  if (isTie && lastKept % 2 === 0) {
    return { significand: exact.significand.slice(0, precision), exponent: exact.exponent };
  }
  return splitExponential(magnitude.toExponential(precision - 1));
}

function stripZeros(text: string): string {
  if (!text.includes(".")) return text;
  return text.replace(/0+$/, "").replace(/\.$/, "");
}
