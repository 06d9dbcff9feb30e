/**
 * Statistics helpers for the advisors.
 */

/**
 * Arithmetic mean. NaN for an empty list.
 */
export function mean(values: readonly number[]): number {
    if (values.length === 0) return NaN;
    return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Sample (n-1) standard deviation. NaN for fewer than two values.
 */
export function sampleStdDev(values: readonly number[]): number {
    if (values.length < 2) return NaN;
    const avg = mean(values);
    const squaredDiffs = values.map((value) => Math.pow(value - avg, 2));
    return Math.sqrt(squaredDiffs.reduce((sum, value) => sum + value, 0) / (values.length - 1));
}

/**
 * Error function, Abramowitz-Stegun 7.1.26 (|error| < 1.5e-7).
 */
function erf(x: number): number {
    const sign = x < 0 ? -1 : 1;
    const ax = Math.abs(x);
    const t = 1 / (1 + 0.3275911 * ax);
    const poly = t * (0.254829592 + t * (-0.284496736 + t * (1.421413741 + t * (-1.453152027 + t * 1.061405429))));
    return sign * (1 - poly * Math.exp(-ax * ax));
}

/**
 * Standard normal cumulative distribution function.
 */
export function normalCdf(z: number): number {
    return 0.5 * (1 + erf(z / Math.SQRT2));
}

// Acklam's rational approximation coefficients
const A = [-3.969683028665376e1, 2.209460984245205e2, -2.759285104469687e2, 1.38357751867269e2, -3.066479806614716e1, 2.506628277459239];
const B = [-5.447609879822406e1, 1.615858368580409e2, -1.556989798598866e2, 6.680131188771972e1, -1.328068155288572e1];
const C = [-7.784894002430293e-3, -3.223964580411365e-1, -2.400758277161838, -2.549732539343734, 4.374664141464968, 2.938163982698783];
const D = [7.784695709041462e-3, 3.224671290700398e-1, 2.445134137142996, 3.754408661907416];
const P_LOW = 0.02425;

/**
 * Inverse of the standard normal CDF (Acklam, relative error < 1.2e-9).
 *
 * @throws RangeError when p is outside (0, 1)
 */
export function inverseNormalCdf(p: number): number {
    if (!(p > 0 && p < 1)) {
        throw new RangeError(`Probability must be between 0 and 1 (got ${p})`);
    }

    if (p < P_LOW) {
        const q = Math.sqrt(-2 * Math.log(p));
        return (((((C[0] * q + C[1]) * q + C[2]) * q + C[3]) * q + C[4]) * q + C[5]) /
            ((((D[0] * q + D[1]) * q + D[2]) * q + D[3]) * q + 1);
    }
    if (p > 1 - P_LOW) {
        const q = Math.sqrt(-2 * Math.log(1 - p));
        return -(((((C[0] * q + C[1]) * q + C[2]) * q + C[3]) * q + C[4]) * q + C[5]) /
            ((((D[0] * q + D[1]) * q + D[2]) * q + D[3]) * q + 1);
    }

    const q = p - 0.5;
    const r = q * q;
    return (((((A[0] * r + A[1]) * r + A[2]) * r + A[3]) * r + A[4]) * r + A[5]) * q /
        (((((B[0] * r + B[1]) * r + B[2]) * r + B[3]) * r + B[4]) * r + 1);
}

/**
 * Two-sided critical value: 0.95 -> 1.96.
 */
export function criticalValue(confidenceLevel: number): number {
    return inverseNormalCdf(1 - (1 - confidenceLevel) / 2);
}

/**
 * Uniform source in [0, 1).
 */
export type RandomSource = () => number;

/**
 * Seeded uniform generator (mulberry32).
 */
export function mulberry32(seed: number): RandomSource {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/**
 * Normal sampler over a uniform source (Box-Muller).
 */
export function normalSampler(random: RandomSource, mu: number, sigma: number): () => number {
    return () => {
        // 1 - u keeps the log argument in (0, 1]
        const u1 = 1 - random();
        const u2 = random();
        const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
        return mu + sigma * z;
    };
}

/**
 * Round to 2 decimal places, half away from zero.
 */
export function round2(value: number): number {
    const sign = value < 0 ? -1 : 1;
    return sign * Math.round((Math.abs(value) + Number.EPSILON) * 100) / 100;
}
