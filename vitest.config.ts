import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["./test/**/*.test.ts"],

    // Forks isolate each test file; run loops forked by a test die with its process
    pool: "forks",
    poolOptions: {
      forks: {
        isolate: true
      }
    },
    fileParallelism: true,

    testTimeout: 30000,
    hookTimeout: 30000
  }
})
