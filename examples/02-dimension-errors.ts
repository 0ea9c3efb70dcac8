import { DimensionMismatchError, VectaError, ZeroVectorError, matrix, vector } from '@vecta/core';

function main() {
  const a = vector([1, 2, 3]);
  const b = vector([10, 20, 30, 40]);

  try {
    a.add(b);
  } catch (error) {
    if (error instanceof DimensionMismatchError) {
      console.log(error.message); // add: dimension mismatch, expected [3] but got [4]
      console.log(error.expected, error.actual); // [3] [4]
    }
  }

  try {
    vector([0, 0]).normalized();
  } catch (error) {
    if (error instanceof ZeroVectorError) {
      console.log(error.code, error.operation); // ZeroVector normalized
    }
  }

  // Ragged rows are rejected when the matrix is built
  try {
    matrix([[1, 2], [3]]);
  } catch (error) {
    if (error instanceof VectaError) {
      console.log(error.message);
    }
  }

  // Integer data cannot be divided; the compiler rejects it before run time
  const counts = vector([1n, 2n, 3n]);
  console.log(counts.sum()); // 6n
  // counts.divide(2n);
  //        ^ error: The 'this' context of type 'Vector<bigint>' is not assignable to method's 'this' of type 'Vector<number>'
}

main();
