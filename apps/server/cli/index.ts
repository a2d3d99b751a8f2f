#!/usr/bin/env node
/**
 * Unclaimed Property Search CLI
 *
 * Usage:
 *   unclaimed ingest [locations...]  - Load archives into the search database
 *   unclaimed serve                  - Start the REST API server
 *   unclaimed version                - Display version information
 *
 * Options:
 *   -d, --daemon       Run in background (daemon) mode
 *   -v, --version      Display version information
 *   -h, --help         Display help information
 */

// Load environment variables before the configuration module reads them
import "dotenv/config";
import { version } from "@unclaimed/core";
import { Command } from "commander";
import {
    displayBanner,
    logError,
    setDaemonMode,
    theme,
} from "../service/helpers/terminalUI";
import { printVersion } from "../service/printVersion";

/**
 * Main CLI application instance.
 */
const program = new Command();

/**
 * Configures the CLI program with metadata and global options.
 */
program
    .name("unclaimed")
    .description(
        theme.muted(
            "Ingest and search California unclaimed property records",
        ),
    )
    .version(version, "-v, --version", "Display version information")
    .helpOption("-h, --help", "Display help information");

/**
 * Ingest Command - Loads published archives into the record store and index.
 */
program
    .command("ingest")
    .description("Load unclaimed property archives into the search database")
    .argument("[locations...]", "Archive URLs, paths or names (default: all records)")
    .option("-d, --daemon", "Run in background (daemon) mode", false)
    .option("--tiers", "Load the four amount-tier archives", false)
    .option("--chunk-size <size>", "Records committed per chunk")
    .option("--db <path>", "Database file path")
    .action(
        async (
            locations: string[],
            options: {
                daemon: boolean;
                tiers: boolean;
                chunkSize?: string;
                db?: string;
            },
        ) => {
            // Set daemon mode based on CLI flag
            setDaemonMode(options.daemon);
            displayBanner(version);

            try {
                const { runIngestCommand } = await import("./commands/ingest");
                await runIngestCommand(locations, options);
            } catch (error) {
                logError("Failed to execute ingest command", error);
                process.exit(1);
            }
        },
    );

/**
 * Serve Command - Starts the REST API server.
 */
program
    .command("serve")
    .description("Start the REST API server, building the database if missing")
    .option("-d, --daemon", "Run in background (daemon) mode", false)
    .option("-p, --port <port>", "Port to listen on")
    .option("--db <path>", "Database file path")
    .action(
        async (options: { daemon: boolean; port?: string; db?: string }) => {
            setDaemonMode(options.daemon);
            displayBanner(version);

            try {
                const { runServeCommand } = await import("./commands/serve");
                await runServeCommand(options);
            } catch (error) {
                logError("Failed to execute serve command", error);
                process.exit(1);
            }
        },
    );

/**
 * Version Command - Displays detailed version information.
 */
program
    .command("version")
    .description("Display detailed version and environment information")
    .action(() => {
        displayBanner(version);
        printVersion();
    });

// Show banner and help if no command provided
if (process.argv.length === 2) {
    displayBanner(version);
    program.outputHelp();
    process.exit(0);
}

/**
 * Parse command line arguments and execute.
 */
program.parseAsync(process.argv).catch((error: unknown) => {
    logError("Unexpected CLI failure", error);
    process.exit(1);
});
