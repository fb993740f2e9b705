#!/usr/bin/env node

import chalk from "chalk";
import { Command, Option } from "commander";
import NpmState, { type CliOptions } from "./NpmState";
import { DESIRED_STATES } from "./types/State";

main();

function main() {
    const cli = new Command();

    const packageJson: { name: string; version: string } = require("../package.json");

    cli
        .name(packageJson.name)
        .version(packageJson.version)
        .description("Brings npm packages of a project or the global environment into a desired state")
        .option("-n, --name <name>", "name of the package to manage")
        .option("-p, --path <dir>", "project directory to run npm in")
        .option("--package-version <version>", "version of the package to install")
        .option("-g, --global", "manage globally installed packages")
        .option("--production", "install without devDependencies")
        .option("--ignore-scripts", "pass --ignore-scripts to npm")
        .option("-r, --registry <url>", "registry to install packages from")
        .addOption(new Option("-s, --state <state>", "desired state of the package (default: present)").choices(DESIRED_STATES))
        .option("-e, --executable <path>", "npm executable to use, e.g. one installed by nvm")
        .option("--check", "report what would change without changing anything")
        .option("-c, --config [file]", "reconcile every package listed in a manifest (default: .npm-state.json)")
        .option("-i, --init", "creates a .npm-state.json from the packages installed now")
        .option("-j, --json", "output results in JSON format")
        .option("-v, --verbose", "log every npm command and its outcome")
        .parse(process.argv);

    const withOptions = cli.opts<CliOptions>();

    try {
        const npmState = new NpmState(withOptions);
        process.exitCode = npmState.execute();
    } catch (error) {
        console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
        process.exitCode = 1;
    }
}
