import { version } from "@unclaimed/core";
import { DB_PATH, SERVER_PORT, SOURCE_BASE_URL } from "./config";
import { theme } from "./helpers/terminalUI";

/**
 * Prints version and environment metadata to stdout.
 */
export function printVersion(): void {
    // Get the environment from the process environment variables
    let environment = process.env.NODE_ENV || "development";

    // If the environment is development, add a message to the environment
    if (environment === "development")
        environment = `${environment} (set NODE_ENV to 'production' in production environments)`;

    console.log(`${theme.muted("Version:")}      ${version}`);
    console.log(`${theme.muted("Node.js:")}      ${process.version}`);
    console.log(`${theme.muted("Platform:")}     ${process.platform}/${process.arch}`);
    console.log(`${theme.muted("Environment:")}  ${environment}`);
    console.log(`${theme.muted("Database:")}     ${DB_PATH}`);
    console.log(`${theme.muted("Source:")}       ${SOURCE_BASE_URL}`);
    console.log(`${theme.muted("Port:")}         ${SERVER_PORT}`);
}
