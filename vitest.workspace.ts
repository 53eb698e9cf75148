import { defineWorkspace } from "vitest/config";

export default defineWorkspace(["./core/vitest.config.ts", "./assessment/vitest.config.ts"]);
