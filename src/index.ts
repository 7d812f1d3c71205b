#!/usr/bin/env node
import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

const executedDirectly = process.argv[1]
  ? pathToFileURL(process.argv[1]).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv);
}

export { runCli };
export { evaluateSite, selectThreshold } from "./evaluator.js";
export { dispatchNotification, createDispatcher } from "./dispatcher.js";
export { createMonitor, runCheck, runDaemon } from "./orchestrator.js";
export { probeCertificate } from "./probe.js";
export { StateStore, readStateFile } from "./cache.js";
export { loadMonitorConfig, parseMonitorConfig } from "./sites.js";
export { resolveChannels } from "./channels.js";
export * from "./errors.js";
export type * from "./types.js";
