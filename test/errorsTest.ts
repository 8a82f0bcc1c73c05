/**
 * Errors raised by the Adams-Bashforth integrator.
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
  AdamsBashforthError,
  InsufficientInitialPointsError,
  InvalidOrderError,
  InvalidRangeError,
  InvalidStepSizeError,
  NonUniformSpacingError,
} from '../src/errors'
import assert = require('assert')

describe('errors', () => {
  let errors: AdamsBashforthError[] = [
    new InvalidRangeError(1, 0.5),
    new InvalidStepSizeError(-0.1),
    new NonUniformSpacingError(1, 0.21, 0.2),
    new InsufficientInitialPointsError(4, 3, 3),
    new InvalidOrderError(6),
  ]

  for (let e of errors) {
    it(`${e.name} is an AdamsBashforthError`, () => {
      assert(e instanceof AdamsBashforthError)
      assert(e instanceof Error)
    })
    it(`${e.name} is named after its class`, () => assert.strictEqual(e.name, e.constructor.name))
  }

  it('describes the range', () => {
    let e = new InvalidRangeError(1, 0.5)
    assert.strictEqual(e.message, 'final x must exceed last initial x (0.5 <= 1)')
    assert.strictEqual(e.xLast, 1)
    assert.strictEqual(e.xFinal, 0.5)
  })
  it('describes the step size', () => {
    assert.strictEqual(new InvalidStepSizeError(0).message, 'step size must be positive: 0')
  })
  it('describes the spacing', () => {
    let e = new NonUniformSpacingError(1, 0.21, 0.2)
    assert.strictEqual(e.message, 'x values must be equally spaced by the step size 0.2: gap at index 1 is 0.21')
    assert.strictEqual(e.index, 1)
    assert.strictEqual(e.spacing, 0.21)
  })
  it('names the required number of points', () => {
    let e = new InsufficientInitialPointsError(4, 3, 2)
    assert.strictEqual(e.message, 'insufficient initial points: required 4, got 3 x and 2 y values')
    assert.strictEqual(e.required, 4)
  })
  it('names the order', () => {
    assert.strictEqual(new InvalidOrderError(6).message, 'no Adams-Bashforth method of order 6')
    assert.strictEqual(new InvalidOrderError(6).name, 'InvalidOrderError')
  })
})
