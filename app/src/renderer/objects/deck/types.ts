/** Uniform random source in [0, 1), injectable for tests */
export type RandomSource = () => number;
