/**
 * @module math/linear-algebra
 * @description Lightweight real linear algebra for geometry fitting and optimization.
 * Provides vector and 3x3 matrix operations without external dependencies.
 */

// ==================== Vector Operations ====================

/**
 * Compute the squared Euclidean norm of a vector
 */
export function squaredNorm(v: readonly number[]): number {
    let sum = 0;
    for (let i = 0; i < v.length; i++) {
        sum += v[i] * v[i];
    }
    return sum;
}

/**
 * Compute the Euclidean norm (L2 norm) of a vector
 */
export function norm(v: readonly number[]): number {
    return Math.sqrt(squaredNorm(v));
}

/**
 * Subtract two vectors: a - b
 */
export function subtract(a: readonly number[], b: readonly number[]): number[] {
    const result: number[] = new Array(a.length);
    for (let i = 0; i < a.length; i++) {
        result[i] = a[i] - b[i];
    }
    return result;
}

/**
 * Scale a vector by a scalar: s * v
 */
export function scale(v: readonly number[], s: number): number[] {
    const result: number[] = new Array(v.length);
    for (let i = 0; i < v.length; i++) {
        result[i] = v[i] * s;
    }
    return result;
}

/**
 * Linear combination: a + s * b
 */
export function axpy(a: readonly number[], s: number, b: readonly number[]): number[] {
    const result: number[] = new Array(a.length);
    for (let i = 0; i < a.length; i++) {
        result[i] = a[i] + s * b[i];
    }
    return result;
}

// ==================== 3D Vector Operations ====================

export type Vec3 = [number, number, number];

/**
 * 3D dot product: a · b
 */
export function dot3(a: Vec3, b: Vec3): number {
    return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

/**
 * 3D vector magnitude (Euclidean length)
 */
export function magnitude3(v: Vec3): number {
    return Math.sqrt(v[0] * v[0] + v[1] * v[1] + v[2] * v[2]);
}

/**
 * Normalize a 3D vector to unit length
 */
export function normalize3(v: Vec3): Vec3 {
    const n = magnitude3(v);
    if (n < 1e-12) return [0, 0, 0];
    return [v[0] / n, v[1] / n, v[2] / n];
}

/**
 * 3D vector subtraction: a - b
 */
export function sub3(a: Vec3, b: Vec3): Vec3 {
    return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

/**
 * 3D vector scalar multiplication: s * v
 */
export function scale3(v: Vec3, s: number): Vec3 {
    return [v[0] * s, v[1] * s, v[2] * s];
}

// ==================== 3x3 Matrix Operations ====================

export type Mat3 = [[number, number, number], [number, number, number], [number, number, number]];

/**
 * Create a 3x3 identity matrix
 */
export function identity3(): Mat3 {
    return [
        [1, 0, 0],
        [0, 1, 0],
        [0, 0, 1]
    ];
}

/**
 * Create a 3x3 zero matrix
 */
export function zeroMat3(): Mat3 {
    return [
        [0, 0, 0],
        [0, 0, 0],
        [0, 0, 0]
    ];
}

/**
 * Sample covariance (population normalization) of 3D points about their centroid
 */
export function covariance3(points: readonly Vec3[]): { centroid: Vec3; covariance: Mat3 } {
    const n = points.length;
    const centroid: Vec3 = [0, 0, 0];
    for (const p of points) {
        centroid[0] += p[0] / n;
        centroid[1] += p[1] / n;
        centroid[2] += p[2] / n;
    }

    const C = zeroMat3();
    for (const p of points) {
        const d = sub3(p, centroid);
        for (let i = 0; i < 3; i++) {
            for (let j = 0; j < 3; j++) {
                C[i][j] += (d[i] * d[j]) / n;
            }
        }
    }
    return { centroid, covariance: C };
}

/**
 * Jacobi eigenvalue algorithm for a 3x3 symmetric matrix.
 *
 * Eigenvalues are sorted in descending order; column j of `eigenvectors`
 * belongs to eigenvalue j.
 */
export function eigenSymmetric3(A: Mat3): { eigenvalues: Vec3; eigenvectors: Mat3 } {
    const a: Mat3 = [
        [A[0][0], A[0][1], A[0][2]],
        [A[1][0], A[1][1], A[1][2]],
        [A[2][0], A[2][1], A[2][2]]
    ];
    const v = identity3();

    const maxIter = 50;
    // Off-diagonal threshold relative to the matrix scale
    const scaleRef = Math.max(Math.abs(a[0][0]), Math.abs(a[1][1]), Math.abs(a[2][2]), 1e-300);
    const eps = 1e-15 * scaleRef;

    for (let iter = 0; iter < maxIter; iter++) {
        // Find largest off-diagonal element
        let maxVal = 0;
        let p = 0, q = 1;
        for (let i = 0; i < 3; i++) {
            for (let j = i + 1; j < 3; j++) {
                if (Math.abs(a[i][j]) > maxVal) {
                    maxVal = Math.abs(a[i][j]);
                    p = i;
                    q = j;
                }
            }
        }

        if (maxVal <= eps) break;

        // Jacobi rotation
        const theta = 0.5 * Math.atan2(2 * a[p][q], a[q][q] - a[p][p]);
        const c = Math.cos(theta);
        const s = Math.sin(theta);

        const app = a[p][p];
        const aqq = a[q][q];
        const apq = a[p][q];

        a[p][p] = c * c * app - 2 * s * c * apq + s * s * aqq;
        a[q][q] = s * s * app + 2 * s * c * apq + c * c * aqq;
        a[p][q] = 0;
        a[q][p] = 0;

        for (let i = 0; i < 3; i++) {
            if (i !== p && i !== q) {
                const aip = a[i][p];
                const aiq = a[i][q];
                a[i][p] = c * aip - s * aiq;
                a[p][i] = a[i][p];
                a[i][q] = s * aip + c * aiq;
                a[q][i] = a[i][q];
            }
        }

        // Apply rotation to v (eigenvectors)
        for (let i = 0; i < 3; i++) {
            const vip = v[i][p];
            const viq = v[i][q];
            v[i][p] = c * vip - s * viq;
            v[i][q] = s * vip + c * viq;
        }
    }

    // Sort eigenvalues in descending order
    const eigenvalues: Vec3 = [a[0][0], a[1][1], a[2][2]];
    const indices = [0, 1, 2].sort((i, j) => eigenvalues[j] - eigenvalues[i]);

    const sortedEigenvalues: Vec3 = [
        eigenvalues[indices[0]],
        eigenvalues[indices[1]],
        eigenvalues[indices[2]]
    ];

    const sortedEigenvectors: Mat3 = [
        [v[0][indices[0]], v[0][indices[1]], v[0][indices[2]]],
        [v[1][indices[0]], v[1][indices[1]], v[1][indices[2]]],
        [v[2][indices[0]], v[2][indices[1]], v[2][indices[2]]]
    ];

    return { eigenvalues: sortedEigenvalues, eigenvectors: sortedEigenvectors };
}

/**
 * Eigenvector of the largest eigenvalue of a symmetric 3x3 matrix
 */
export function dominantEigenvector3(A: Mat3): { value: number; vector: Vec3 } {
    const { eigenvalues, eigenvectors } = eigenSymmetric3(A);
    return {
        value: eigenvalues[0],
        vector: normalize3([eigenvectors[0][0], eigenvectors[1][0], eigenvectors[2][0]]),
    };
}
