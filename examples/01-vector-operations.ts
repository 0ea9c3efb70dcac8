import { float32, identity, matrix, subtractFrom, vector } from '@vecta/core';

function main() {
  const a = vector([1, 2, 3]);
  const b = vector([4, 5, 6]);

  // Element-wise arithmetic returns new vectors
  console.log(a.add(b).format()); // [5, 7, 9]
  console.log(a.subtract(10).format()); // [-9, -8, -7]
  console.log(subtractFrom(10, a).format()); // [9, 8, 7]

  // Vector algebra
  console.log(a.dot(b)); // 32
  console.log(vector([3, 4]).magnitude()); // 5
  console.log(vector([1, 0]).angleInDegrees(vector([1, 1]))); // 45

  // Matrix product and the Hadamard product are different operations
  const m = matrix([
    [1, 2],
    [3, 4],
  ]);
  const n = matrix([
    [5, 6],
    [7, 8],
  ]);
  console.log(m.multiplyMatrix(n).format()); // [[19, 22], [43, 50]]
  console.log(m.multiply(n).format()); // [[5, 12], [21, 32]]

  // Rotate [1, 0] by 90 degrees
  const rotation = matrix([
    [0, -1],
    [1, 0],
  ]);
  console.log(vector([1, 0]).transformedBy(rotation).format()); // [0, 1]
  console.log(identity(3).info());

  // float32 keeps single precision through every step
  const single = vector([0.1, 0.2], { dtype: float32 });
  console.log(single.sum()); // 0.30000001192092896

  // Statistics
  const data = vector([1, 2, 3, 4, 5]);
  console.log(data.variance(), data.variance(1)); // 2 2.5
  console.log(vector([1, 2, 3, 100]).outlierMask({ threshold: 1.5 })); // [false, false, false, true]
}

main();
