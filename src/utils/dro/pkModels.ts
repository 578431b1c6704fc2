import type { ParameterRecord } from '../../types/dro';

/**
 * Tracer-kinetic forward models.
 *
 * Each model is `Ct(t) = (ca ⊛ R)(t)` for an impulse response R (extended Tofts
 * adds an explicit `vp * ca(t)` term), with the convolution integrated by the
 * trapezoid rule on the (possibly non-uniform) sample grid. Times are in minutes.
 */

export type ImpulseResponse = (tau: number) => number;

function readParam(params: ParameterRecord, name: string, opts?: { positive?: boolean }): number {
  const v = params[name];
  if (typeof v !== 'number' || !Number.isFinite(v)) {
    throw new Error(`parameter ${name} is not a finite number`);
  }
  if (v < 0 || (opts?.positive && v === 0)) {
    throw new Error(`parameter ${name} must be ${opts?.positive ? 'positive' : 'non-negative'} (got ${v})`);
  }
  return v;
}

function checkInputs(time: Float64Array, aif: Float64Array): void {
  if (time.length !== aif.length) {
    throw new Error(`time/aif length mismatch (${time.length} vs ${aif.length})`);
  }
}

/**
 * Trapezoidal convolution of the AIF with an impulse response, evaluated at
 * every sample time.
 */
export function convolveAif(time: Float64Array, aif: Float64Array, response: ImpulseResponse): Float64Array {
  checkInputs(time, aif);
  const n = time.length;
  const out = new Float64Array(n);

  for (let i = 1; i < n; i++) {
    const ti = time[i];
    let acc = 0;
    let prev = aif[0] * response(ti - time[0]);
    for (let j = 1; j <= i; j++) {
      const cur = aif[j] * response(ti - time[j]);
      acc += 0.5 * (time[j] - time[j - 1]) * (prev + cur);
      prev = cur;
    }
    out[i] = acc;
  }

  return out;
}

function addPlasma(curve: Float64Array, aif: Float64Array, vp: number): Float64Array {
  if (vp === 0) return curve;
  for (let i = 0; i < curve.length; i++) {
    curve[i] += vp * aif[i];
  }
  return curve;
}

function toftsKep(params: ParameterRecord, kt: number): number {
  const kep = params.kep;
  if (typeof kep === 'number' && Number.isFinite(kep)) {
    return readParam(params, 'kep');
  }
  const ve = readParam(params, 've', { positive: true });
  return kt / ve;
}

/** Standard Tofts: R(t) = Kt * exp(-kep * t). A stored vp is ignored. */
export function modelTofts(time: Float64Array, aif: Float64Array, params: ParameterRecord): Float64Array {
  const kt = readParam(params, 'Kt');
  const kep = toftsKep(params, kt);
  return convolveAif(time, aif, (tau) => kt * Math.exp(-kep * tau));
}

/** Extended Tofts: standard Tofts plus a vascular term vp * ca(t). */
export function modelExtendedTofts(
  time: Float64Array,
  aif: Float64Array,
  params: ParameterRecord
): Float64Array {
  const vp = readParam(params, 'vp');
  return addPlasma(modelTofts(time, aif, params), aif, vp);
}

/**
 * Compartmental tissue uptake model (CTUM).
 *
 * Tp = vp / (Fp + PS), E = PS / (Fp + PS), R(t) = Fp * [(1 - E) exp(-t/Tp) + E].
 */
export function modelUptake(time: Float64Array, aif: Float64Array, params: ParameterRecord): Float64Array {
  const fp = readParam(params, 'Fp', { positive: true });
  const ps = readParam(params, 'PS');
  const vp = readParam(params, 'vp', { positive: true });

  const tp = vp / (fp + ps);
  const e = ps / (fp + ps);
  return convolveAif(time, aif, (tau) => fp * ((1 - e) * Math.exp(-tau / tp) + e));
}

/**
 * Two-compartment exchange model (2CXM), bi-exponential form. The fitted T, Te
 * and Tp maps are derived quantities; the curve is rebuilt from Fp, PS, ve, vp.
 */
export function modelExchange(time: Float64Array, aif: Float64Array, params: ParameterRecord): Float64Array {
  const fp = readParam(params, 'Fp', { positive: true });
  const ps = readParam(params, 'PS', { positive: true });
  const ve = readParam(params, 've', { positive: true });
  const vp = readParam(params, 'vp', { positive: true });

  const T = (vp + ve) / fp;
  const te = ve / ps;
  const tp = vp / (fp + ps);

  const sum = T + te;
  const disc = Math.max(0, sum * sum - 4 * tp * te);
  const root = Math.sqrt(disc);
  const sigmaPlus = (sum + root) / (2 * tp * te);
  const sigmaMinus = (sum - root) / (2 * tp * te);

  const gap = sigmaPlus - sigmaMinus;
  if (!(gap > 0) || !Number.isFinite(gap)) {
    throw new Error('degenerate exchange rates (sigma+ == sigma-)');
  }

  const a = ((T * sigmaPlus - 1) * sigmaMinus) / gap;
  const b = ((1 - T * sigmaMinus) * sigmaPlus) / gap;

  return convolveAif(time, aif, (tau) => fp * (a * Math.exp(-sigmaMinus * tau) + b * Math.exp(-sigmaPlus * tau)));
}
