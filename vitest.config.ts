import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

export default defineConfig({
    resolve: {
        alias: {
            // Workspace packages export dist/ at runtime; tests run from sources
            "@axfixture/core": fileURLToPath(
                new URL("./packages/axfixture-core/src/index.ts", import.meta.url)
            ),
        },
    },
    test: {
        include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
        environment: "node",
    },
});
