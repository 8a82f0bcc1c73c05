/**
 * Fixed-step Adams-Bashforth integration of scalar initial value problems.
 * This work carries the BSD 2-clause license.
 *
 * Copyright (c) 2016-2023 Colin Smith.
 * 1. Redistributions of source code must retain the above copyright notice, this list of conditions and the following
 * disclaimer.
 * 2. Redistributions in binary form must reproduce the above copyright notice, this list of conditions and the
 * following disclaimer in the documentation and/or other materials provided with the distribution.
 *
 * THIS SOFTWARE IS PROVIDED BY THE COPYRIGHT HOLDERS AND CONTRIBUTORS "AS IS" AND ANY EXPRESS OR IMPLIED WARRANTIES,
 * INCLUDING, BUT NOT LIMITED TO, THE IMPLIED WARRANTIES OF MERCHANTABILITY AND FITNESS FOR A PARTICULAR PURPOSE
 * ARE DISCLAIMED. IN NO EVENT SHALL THE COPYRIGHT HOLDER OR CONTRIBUTORS BE LIABLE FOR ANY DIRECT, INDIRECT,
 * INCIDENTAL, SPECIAL, EXEMPLARY, OR CONSEQUENTIAL DAMAGES (INCLUDING, BUT NOT LIMITED TO, PROCUREMENT OF SUBSTITUTE
 * GOODS OR SERVICES; LOSS OF USE, DATA, OR PROFITS; OR BUSINESS INTERRUPTION) HOWEVER CAUSED AND ON ANY THEORY OF
 * LIABILITY, WHETHER IN CONTRACT, STRICT LIABILITY, OR TORT (INCLUDING NEGLIGENCE OR OTHERWISE) ARISING IN ANY WAY
 * OUT OF THE USE OF THIS SOFTWARE, EVEN IF ADVISED OF THE POSSIBILITY OF SUCH DAMAGE.
 */

import {
  InsufficientInitialPointsError,
  InvalidOrderError,
  InvalidRangeError,
  InvalidStepSizeError,
  NonUniformSpacingError,
} from './errors'

export * from './errors'

// Function computing the value of y' = f(x, y) for scalar y. It is called
// several times per step and should be free of side effects.
export type Derivative = (x: number, y: number) => number

// Orders for which a coefficient set exists.
export type Order = 2 | 3 | 4 | 5

// Coefficients are listed most recent derivative first. The step is
// y[n+1] = y[n] + (h / denominator) * sum(coefficients[j] * f[n-j]).
export type CoefficientSet = {
  readonly coefficients: readonly number[]
  readonly denominator: number
}

// Step observer, invoked once for every extrapolated value: n is the 1-based
// step number and y the value computed at abscissa x. Returning false ends
// the integration early.
export type StepObserver = (n: number, x: number, y: number) => boolean | void

export type Options = {
  spacingDigits: number  // decimal places kept when comparing initial x gaps to the step size
  debug: boolean
}

export enum Outcome {
  Completed,
  EarlyReturn,
}

export type Solution = {
  y: number[],       // y values, starting with the initial values
  xEnd: number,
  nStep: number,     // number of extrapolated values
  nEval: number,     // number of derivative evaluations
  outcome: Outcome,
}

type StepPoint = {
  n: number,
  x: number,
  y: number,
}

const coefficientSet = (coefficients: number[], denominator: number): CoefficientSet =>
  Object.freeze({coefficients: Object.freeze(coefficients), denominator})

// denominator = (order - 1)!
const COEFFICIENTS: Readonly<Record<Order, CoefficientSet>> = Object.freeze({
  2: coefficientSet([3, -1], 1),
  3: coefficientSet([23, -16, 5], 2),
  4: coefficientSet([55, -59, 37, -9], 6),
  5: coefficientSet([1901, -2774, 2616, -1274, 251], 24),
})

export class AdamsBashforth {
  private static defaults: Options = {
    spacingDigits: 10,
    debug: false,
  }

  private options: Options

  readonly f: Derivative
  readonly xInitials: readonly number[]
  readonly yInitials: readonly number[]
  readonly stepSize: number
  readonly xFinal: number

  /**
   * Define the problem y' = f(x, y) with starting values y(xInitials[i]) =
   * yInitials[i], to be integrated with a fixed step up to xFinal. The
   * initial x values must be spaced by exactly stepSize (up to rounding at
   * `spacingDigits` decimal places). The number of initial points is not
   * checked here: each order needs exactly that many.
   *
   * The problem is read-only once constructed; the initial arrays are copied.
   *
   * @param f function to integrate
   * @param xInitials abscissas of the starting values
   * @param yInitials starting values
   * @param stepSize increment of x
   * @param xFinal end of the integration interval
   * @param options dictionary of option updates
   */
  constructor(f: Derivative,
              xInitials: readonly number[],
              yInitials: readonly number[],
              stepSize: number,
              xFinal: number,
              options: Partial<Options> = {}) {
    this.options = Object.assign({}, AdamsBashforth.defaults, options)
    const digits = this.options.spacingDigits
    if (!Number.isInteger(digits) || digits < 0 || digits > 20) throw new Error('spacingDigits must be an integer in [0, 20]')

    if (xInitials.length === 0) throw new InsufficientInitialPointsError(1, 0, yInitials.length)
    const xLast = xInitials[xInitials.length - 1]
    if (xLast >= xFinal) throw new InvalidRangeError(xLast, xFinal)
    if (!(stepSize > 0)) throw new InvalidStepSizeError(stepSize)
    for (let i = 0; i + 1 < xInitials.length; ++i) {
      const spacing = xInitials[i + 1] - xInitials[i]
      if (Number(spacing.toFixed(digits)) !== stepSize) throw new NonUniformSpacingError(i, spacing, stepSize)
    }

    this.f = f
    this.xInitials = xInitials.slice()
    this.yInitials = yInitials.slice()
    this.stepSize = stepSize
    this.xFinal = xFinal
  }

  /**
   * Look up the coefficient set of the Adams-Bashforth method of the given
   * order. The returned object is frozen and shared.
   */
  static coefficients(order: number): CoefficientSet {
    if (!AdamsBashforth.isOrder(order)) throw new InvalidOrderError(order)
    return COEFFICIENTS[order]
  }

  private static isOrder(order: number): order is Order {
    return order === 2 || order === 3 || order === 4 || order === 5
  }

  step2(): number[] {
    return this.step(2)
  }

  step3(): number[] {
    return this.step(3)
  }

  step4(): number[] {
    return this.step(4)
  }

  step5(): number[] {
    return this.step(5)
  }

  /**
   * Integrate with the method of the given order, which must equal the
   * number of initial points. The result starts with the initial y values,
   * followed by one value per step taken past the last initial x.
   *
   * @param order number of past derivative values used per step
   * @returns y values at x = xInitials[0] + i * stepSize
   */
  step(order: Order): number[] {
    return this.solve(order).y
  }

  /**
   * Integrate as `step` does, reporting each extrapolated value to the
   * observer as it is computed. If the observer returns false, integration
   * stops and the solution holds only the values computed so far.
   *
   * @param order number of past derivative values used per step
   * @param observer optional step callback
   * @returns the y values together with summary information about the integration
   */
  solve(order: Order, observer?: StepObserver): Solution {
    const k = this.requireInitialPoints(order)
    const y = new Array<number>(k + this.steps(k))
    for (let i = 0; i < k; ++i) y[i] = this.yInitials[i]

    const points = this.trajectory(k, y)
    let nStep = 0
    let outcome = Outcome.Completed
    let s = points.next()
    while (!s.done) {
      ++nStep
      const proceed = observer?.(s.value.n, s.value.x, s.value.y)
      if (proceed === false) outcome = Outcome.EarlyReturn
      s = points.next(proceed)
    }
    return {
      y: outcome === Outcome.Completed ? y : y.slice(0, k + nStep),
      xEnd: this.xFinal,
      nStep: nStep,
      nEval: k * nStep,
      outcome: outcome,
    }
  }

  /**
   * The number of steps the method of the given order takes past the last
   * initial x value.
   */
  stepCount(order: Order): number {
    return this.steps(this.requireInitialPoints(order))
  }

  /**
   * The x values belonging to the y values produced by `step(order)`. Each
   * abscissa past the initial ones is the previous one plus the step size.
   */
  abscissas(order: Order): number[] {
    const k = this.requireInitialPoints(order)
    const n = this.steps(k)
    const x = this.xInitials.slice(0, k)
    for (let i = 0; i < n; ++i) x.push(x[x.length - 1] + this.stepSize)
    return x
  }

  private requireInitialPoints(order: number): Order {
    if (!AdamsBashforth.isOrder(order)) throw new InvalidOrderError(order)
    if (this.xInitials.length !== order || this.yInitials.length !== order) {
      throw new InsufficientInitialPointsError(order, this.xInitials.length, this.yInitials.length)
    }
    return order
  }

  private steps(k: Order): number {
    return Math.floor((this.xFinal - this.xInitials[k - 1]) / this.stepSize)
  }

  /**
   * Fill y[k..] by extrapolation, yielding after each new value. The first k
   * entries of y must hold the initial values. The abscissas of the last k
   * points are kept in a ring buffer whose oldest entry sits at `head`.
   *
   * Derivatives are evaluated at the window abscissas paired with y[0..k),
   * the initial segment, at every step, not with y[i..i+k) as in the
   * textbook method.
   */
  private *trajectory(k: Order, y: number[]): Generator<StepPoint, void, boolean | void> {
    const {coefficients: c, denominator: d} = COEFFICIENTS[k]
    const h = this.stepSize
    const window = this.xInitials.slice(0, k)
    const fVals = new Array<number>(k)
    let head = 0

    for (let i = 0; k + i < y.length; ++i) {
      for (let j = 0; j < k; ++j) fVals[j] = this.f(window[(head + j) % k], y[j])
      let sum = 0
      for (let j = 0; j < k; ++j) sum += c[j] * fVals[k - 1 - j]
      y[k + i] = y[k + i - 1] + (h / d) * sum

      const x = window[(head + k - 1) % k] + h
      window[head] = x
      head = (head + 1) % k

      this.options.debug && console.log(`#${i + 1} x=${x} y=${y[k + i]}`)
      const proceed = yield {n: i + 1, x: x, y: y[k + i]}
      if (proceed === false) return
    }
  }
}
