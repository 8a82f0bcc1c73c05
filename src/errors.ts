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

// Base class of everything the integrator throws for a bad problem definition.
// Option mistakes are reported with a plain Error.
export class AdamsBashforthError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

// The final x value does not lie beyond the last initial x value.
export class InvalidRangeError extends AdamsBashforthError {
  constructor(readonly xLast: number, readonly xFinal: number) {
    super(`final x must exceed last initial x (${xFinal} <= ${xLast})`)
  }
}

export class InvalidStepSizeError extends AdamsBashforthError {
  constructor(readonly stepSize: number) {
    super(`step size must be positive: ${stepSize}`)
  }
}

// The gap between xInitials[index] and xInitials[index + 1] is not the step size.
export class NonUniformSpacingError extends AdamsBashforthError {
  constructor(readonly index: number, readonly spacing: number, readonly stepSize: number) {
    super(`x values must be equally spaced by the step size ${stepSize}: ` +
      `gap at index ${index} is ${spacing}`)
  }
}

export class InsufficientInitialPointsError extends AdamsBashforthError {
  constructor(readonly required: number, readonly xCount: number, readonly yCount: number) {
    super(`insufficient initial points: required ${required}, got ${xCount} x and ${yCount} y values`)
  }
}

export class InvalidOrderError extends AdamsBashforthError {
  constructor(readonly order: number) {
    super(`no Adams-Bashforth method of order ${order}`)
  }
}
