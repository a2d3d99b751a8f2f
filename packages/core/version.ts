import { existsSync, readFileSync } from "node:fs";
import * as path from "node:path";

/**
 * The version of the unclaimed property toolkit, read from the package manifest.
 */
export const version: string = (() => {
    // Compiled output has no manifest beside it
    const manifestPath = path.join(__dirname, "package.json");
    if (!existsSync(manifestPath)) return "0.0.0";

    const manifest: unknown = JSON.parse(readFileSync(manifestPath, "utf8"));
    if (
        typeof manifest === "object" &&
        manifest !== null &&
        "version" in manifest &&
        typeof manifest.version === "string"
    ) {
        return manifest.version;
    }
    return "0.0.0";
})();
