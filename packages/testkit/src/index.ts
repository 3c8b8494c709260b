export { createRng, nextInt, withSeed, type Rng } from "./rng.js";
export { assert, describe, mock, test } from "./nodeTest.js";
