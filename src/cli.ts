#!/usr/bin/env node
/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { AppConfig, loadConfig, usage } from "./config";
import { defaultServices, runMaintenance, runRotation } from "./core";
import { StartupError, UsageError, describeError } from "./lib/errors";
import { getLogFile, logError, logInfo, setLogFile } from "./lib/log";

export const ExitCode = {
    ok: 0,
    startup: 1,
    usage: 2
} as const;

const report = (error: unknown): number => {
    const logFile = getLogFile();
    if(error instanceof UsageError){
        process.stderr.write(`wallcycle: ${error.message}\nTry 'wallcycle --help'.\n`);
        return ExitCode.usage;
    }
    logError("cli", "Startup failed", error);
    const cause = error instanceof Error && error.cause !== undefined ? `\n  caused by ${describeError(error.cause)}` : "";
    const message = error instanceof StartupError ? error.message : describeError(error);
    process.stderr.write(`wallcycle: ${message}${cause}\n${logFile ? `See ${logFile} for details.\n` : ""}`);
    return ExitCode.startup;
};

export const main = async (argv: readonly string[]): Promise<number> => {
    let config: AppConfig;
    try{
        config = loadConfig(argv);
    }catch(error){
        return report(error);
    }
    if(config.help){
        process.stdout.write(usage);
        return ExitCode.ok;
    }

    try{
        setLogFile(config.logFile);
        logInfo("cli", `Starting with store ${config.store}`);
        if(config.maintenance){
            const result = runMaintenance(config);
            process.stdout.write(`Checked ${result.checked} wallpapers, ${result.dead} have no path left, saved ${result.saved}.\n`);
        }else{
            await runRotation(config, defaultServices(config));
        }
        logInfo("cli", "Stopped");
        return ExitCode.ok;
    }catch(error){
        return report(error);
    }
};

if(require.main === module){
    main(process.argv.slice(2)).then(
        (code) => {
            process.exitCode = code;
        },
        (error: unknown) => {
            process.exitCode = report(error);
        }
    );
}
