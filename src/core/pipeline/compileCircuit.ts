// src/core/pipeline/compileCircuit.ts
// One-call compile: scan, parse and build a definition into the collaborator ports

import type { Diagnostic } from "../../outcome/diagnostic";
import type { Outcome } from "../../outcome/outcome";
import { isFail } from "../../outcome/outcome";
import { done, fail, semanticFailed } from "../../outcome/constructors";
import { failure } from "../../outcome/failure";
import type { CircuitPorts } from "../../ports/composite";
import type { DiagnosticSink } from "../../ports/sink";
import type { TraceSink } from "../../ports/types";
import { createSink } from "../../adapters/sinks";
import { consoleTraceSink, loggingDevices, loggingMonitors, loggingNetwork } from "../../adapters/logging";
import { DEFAULT_CONFIG, severityOverrides, type CircuitConfig } from "../config/config";
import type { NameTable } from "../reader/names";
import { Scanner } from "../reader/scanner";
import { Parser } from "../parser/parser";

export type CircuitSource =
  | { path: string; source?: undefined }
  | { source: string; path?: string };

export type CompileInput = CircuitPorts &
  CircuitSource & {
    names: NameTable;
    config?: CircuitConfig;
    /** Replaces the sink the config's diagnostics mode would pick. */
    sink?: DiagnosticSink;
    /** Replaces the console trace sink `trace.enabled` would pick. */
    trace?: TraceSink;
  };

export interface CompileReport {
  diagnostics: Diagnostic[];
  /** Rendered diagnostics in buffered mode; "" in direct mode. */
  messages: string;
}

/**
 * Compile a definition into `devices`, `network` and `monitors`. The ports
 * are mutated in place; on failure they hold a partial circuit.
 */
export function compileCircuit(input: CompileInput): Outcome<CompileReport> {
  const config = input.config ?? DEFAULT_CONFIG;
  const sink = input.sink ?? createSink(config.diagnostics.mode);
  const trace = input.trace ?? (config.trace.enabled ? consoleTraceSink() : undefined);

  const devices = trace ? loggingDevices(input.devices, trace) : input.devices;
  const network = trace ? loggingNetwork(input.network, trace) : input.network;
  const monitors = trace ? loggingMonitors(input.monitors, trace) : input.monitors;

  const scannerOptions = { sink, linePrefix: config.diagnostics.linePrefix };
  let scanner: Scanner;
  if (input.source !== undefined) {
    scanner = Scanner.fromText(input.source, input.names, { ...scannerOptions, path: input.path });
  } else {
    try {
      scanner = new Scanner(input.path, input.names, scannerOptions);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      return fail(
        failure("source-unreadable", `Cannot read definition file ${input.path}: ${reason}`, {
          context: { path: input.path },
        })
      );
    }
  }

  const parser = new Parser(input.names, devices, network, monitors, scanner, {
    severity: severityOverrides(config),
    trace,
    summary: config.diagnostics.summary,
  });

  const parsed = parser.parseFile();
  if (isFail(parsed)) {
    return fail({
      ...parsed.failure,
      diagnostics: parser.getDiagnostics(),
      context: { ...parsed.failure.context, messages: scanner.getErrorMessages() },
    });
  }

  if (!parser.buildNetwork(parsed.value)) {
    const rejected = semanticFailed(parser.getDiagnostics());
    return fail({ ...rejected.failure, context: { messages: scanner.getErrorMessages() } });
  }

  return done({ diagnostics: parser.getDiagnostics(), messages: scanner.getErrorMessages() });
}

/** Buffered messages carried by a failed compile, or "" when there are none. */
export function failureMessages(context: Record<string, unknown> | undefined): string {
  const messages = context?.messages;
  return typeof messages === "string" ? messages : "";
}
