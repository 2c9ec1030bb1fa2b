import { defineConfig } from "vitest/config";

const nodeMajor = (() => {
  const major = Number.parseInt(process.versions.node.split(".", 1)[0] ?? "", 10);
  return Number.isFinite(major) ? major : 0;
})();

// Sandboxed runners can report very high core counts; keep the fork pool small.
const vitestMaxForks = nodeMajor >= 23 ? 4 : 8;

export default defineConfig({
  test: {
    // Keep unit tests fast and deterministic; stub browser APIs explicitly.
    environment: "node",
    pool: "forks",
    poolOptions: {
      forks: {
        minForks: 1,
        maxForks: vitestMaxForks,
      },
    },
    include: ["web/src/**/*.test.ts", "src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      reportsDirectory: "coverage",
      include: ["web/src/**/*.ts", "src/**/*.ts"],
      exclude: ["**/*.d.ts", "**/*.test.ts", "web/src/test_utils/**"],
    },
  },
});
