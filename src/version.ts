import { createRequire } from "node:module";

// Keep in sync with package.json
const require = createRequire(import.meta.url);
const { version: pkgVersion } = require("../package.json") as { version: string };
export const DRIVER_VERSION = pkgVersion;
