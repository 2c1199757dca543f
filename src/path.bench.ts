/**
 * Benchmark: path construction, string and varargs forms
 *
 * Run: npm run bench
 */

import { Path } from "./path.ts";
import { path } from "./paths.ts";

function bench(name: string, fn: () => void, iterations = 100_000) {
  // Warmup
  for (let i = 0; i < 1_000; i++) fn();

  const start = performance.now();
  for (let i = 0; i < iterations; i++) fn();
  const elapsed = performance.now() - start;
  const opsPerSec = Math.round((iterations / elapsed) * 1_000);
  console.log(
    `  ${name}: ${opsPerSec.toLocaleString()} ops/sec (${((elapsed / iterations) * 1_000).toFixed(2)} µs/op)`,
  );
}

// -- Benchmarks --

console.log("String form:");
bench("one segment", () => path("/test"));
bench("three segments", () => path("/test/foo/bar"));

console.log("\nVarargs form:");
bench("one segment", () => path("/test", ""));
bench("two segments", () => path("/test", "foo"));
bench("three segments", () => path("/test", "foo", "bar"));

console.log("\nDerived forms (fresh instance each time):");
bench("toString", () => new Path("/a/b/../c/").toString());
bench("normalize", () => new Path("/a/b/../c/").normalize());
