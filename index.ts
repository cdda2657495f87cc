/**
 * Root entry point; the application lives under `src/index.ts`.
 */

import "./src/index.js";
