/**
 * @module math/complex
 * @description Complex scalars, matrices and dense linear solves
 *
 * Matrices use the split real/imaginary layout. Solves use Gaussian
 * elimination with partial pivoting; a pivot below `tolerance` times the
 * largest matrix entry marks the system as singular.
 */

/**
 * Complex scalar
 */
export interface Complex {
    real: number;
    imag: number;
}

/**
 * Complex vector (split layout)
 */
export interface ComplexVector {
    real: number[];
    imag: number[];
}

/**
 * Complex matrix (split layout, row-major)
 */
export interface ComplexMatrix {
    real: number[][];
    imag: number[][];
}

// ==================== Scalars ====================

export function complex(real: number, imag: number = 0): Complex {
    return { real, imag };
}

/**
 * Unit phasor e^{jθ}
 */
export function expj(theta: number): Complex {
    return { real: Math.cos(theta), imag: Math.sin(theta) };
}

/**
 * Polar constructor r·e^{jθ}
 */
export function fromPolar(magnitude: number, phase: number): Complex {
    return { real: magnitude * Math.cos(phase), imag: magnitude * Math.sin(phase) };
}

export function cMul(a: Complex, b: Complex): Complex {
    return {
        real: a.real * b.real - a.imag * b.imag,
        imag: a.real * b.imag + a.imag * b.real,
    };
}

export function cAbs(a: Complex): number {
    return Math.hypot(a.real, a.imag);
}

export function cArg(a: Complex): number {
    return Math.atan2(a.imag, a.real);
}

export function cDiv(a: Complex, b: Complex): Complex {
    const d = b.real * b.real + b.imag * b.imag;
    return {
        real: (a.real * b.real + a.imag * b.imag) / d,
        imag: (a.imag * b.real - a.real * b.imag) / d,
    };
}

// ==================== Matrices ====================

/**
 * Build a complex matrix from an element generator
 */
export function buildMatrix(
    rows: number,
    cols: number,
    entry: (row: number, col: number) => Complex
): ComplexMatrix {
    const real: number[][] = [];
    const imag: number[][] = [];
    for (let i = 0; i < rows; i++) {
        const rowReal: number[] = [];
        const rowImag: number[] = [];
        for (let j = 0; j < cols; j++) {
            const z = entry(i, j);
            rowReal.push(z.real);
            rowImag.push(z.imag);
        }
        real.push(rowReal);
        imag.push(rowImag);
    }
    return { real, imag };
}

/**
 * Hermitian transpose A^H
 */
export function hermitianTranspose(A: ComplexMatrix): ComplexMatrix {
    const rows = A.real.length;
    const cols = rows > 0 ? A.real[0].length : 0;
    return buildMatrix(cols, rows, (i, j) => complex(A.real[j][i], -A.imag[j][i]));
}

/**
 * Matrix product A·B
 */
export function matMul(A: ComplexMatrix, B: ComplexMatrix): ComplexMatrix {
    const m = A.real.length;
    const k = B.real.length;
    const n = k > 0 ? B.real[0].length : 0;
    return buildMatrix(m, n, (i, j) => {
        let re = 0;
        let im = 0;
        for (let l = 0; l < k; l++) {
            re += A.real[i][l] * B.real[l][j] - A.imag[i][l] * B.imag[l][j];
            im += A.real[i][l] * B.imag[l][j] + A.imag[i][l] * B.real[l][j];
        }
        return complex(re, im);
    });
}

/**
 * Matrix-vector product A·x
 */
export function matVec(A: ComplexMatrix, x: ComplexVector): ComplexVector {
    const m = A.real.length;
    const real: number[] = new Array(m).fill(0);
    const imag: number[] = new Array(m).fill(0);
    for (let i = 0; i < m; i++) {
        for (let j = 0; j < x.real.length; j++) {
            real[i] += A.real[i][j] * x.real[j] - A.imag[i][j] * x.imag[j];
            imag[i] += A.real[i][j] * x.imag[j] + A.imag[i][j] * x.real[j];
        }
    }
    return { real, imag };
}

function maxAbsEntry(A: ComplexMatrix): number {
    let max = 0;
    for (let i = 0; i < A.real.length; i++) {
        for (let j = 0; j < A.real[i].length; j++) {
            max = Math.max(max, Math.hypot(A.real[i][j], A.imag[i][j]));
        }
    }
    return max;
}

// ==================== Solvers ====================

/**
 * Solve the square system A·x = b.
 *
 * @returns The solution, or null when A is singular to `tolerance`
 */
export function solveSquare(
    A: ComplexMatrix,
    b: ComplexVector,
    tolerance: number = 1e-10
): ComplexVector | null {
    const n = A.real.length;
    const scaleRef = maxAbsEntry(A);
    if (n === 0 || scaleRef === 0) return null;

    // Augmented working copy
    const re = A.real.map((row, i) => [...row, b.real[i]]);
    const im = A.imag.map((row, i) => [...row, b.imag[i]]);

    for (let col = 0; col < n; col++) {
        let pivot = col;
        let pivotAbs = Math.hypot(re[col][col], im[col][col]);
        for (let row = col + 1; row < n; row++) {
            const abs = Math.hypot(re[row][col], im[row][col]);
            if (abs > pivotAbs) {
                pivot = row;
                pivotAbs = abs;
            }
        }
        if (pivotAbs <= tolerance * scaleRef) {
            return null;
        }
        [re[col], re[pivot]] = [re[pivot], re[col]];
        [im[col], im[pivot]] = [im[pivot], im[col]];

        const p = complex(re[col][col], im[col][col]);
        for (let row = col + 1; row < n; row++) {
            const factor = cDiv(complex(re[row][col], im[row][col]), p);
            for (let j = col; j <= n; j++) {
                const prod = cMul(factor, complex(re[col][j], im[col][j]));
                re[row][j] -= prod.real;
                im[row][j] -= prod.imag;
            }
        }
    }

    // Back substitution
    const real: number[] = new Array(n).fill(0);
    const imag: number[] = new Array(n).fill(0);
    for (let i = n - 1; i >= 0; i--) {
        let acc = complex(re[i][n], im[i][n]);
        for (let j = i + 1; j < n; j++) {
            const prod = cMul(complex(re[i][j], im[i][j]), complex(real[j], imag[j]));
            acc = complex(acc.real - prod.real, acc.imag - prod.imag);
        }
        const x = cDiv(acc, complex(re[i][i], im[i][i]));
        real[i] = x.real;
        imag[i] = x.imag;
    }
    return { real, imag };
}

/**
 * Minimum-norm solution of the under-determined system A·x = b (rows ≤ cols):
 * x = A^H (A A^H)^{-1} b.
 *
 * @returns The solution, or null when A does not have full row rank
 */
export function solveLeastNorm(
    A: ComplexMatrix,
    b: ComplexVector,
    tolerance: number = 1e-10
): ComplexVector | null {
    const AH = hermitianTranspose(A);
    const gram = matMul(A, AH);
    const y = solveSquare(gram, b, tolerance);
    if (y === null) return null;
    return matVec(AH, y);
}
