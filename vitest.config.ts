import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  resolve: {
    alias: {
      taskgraph: fileURLToPath(new URL("./src/index.ts", import.meta.url)),
    },
  },
  test: {
    dir: "test",
    include: ["**/*.test.ts"],
    // Continuation lifetime tests call gc().
    pool: "forks",
    poolOptions: {
      forks: {
        execArgv: ["--expose-gc"],
      },
    },
  },
});
