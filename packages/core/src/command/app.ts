/**
 * App - the root command plus program metadata.
 *
 * Owns the command tree and the cached usage text. exec() resolves one
 * route per call and converts every fault into a Status.
 */

import { statSync } from "node:fs";
import { basename } from "node:path";
import { ConfigError, Status, StatusError } from "@flagroute/sdk";
import type { ActionFunc, ActionInput, Author, FilterInput, OutputSink, ValidateFunc } from "@flagroute/sdk";
import { AppInfoSchema, createLogger, validateInput } from "@flagroute/shared";
import type { AppInfo } from "@flagroute/shared";
import { formatFlagDefaults } from "../flags/usage.js";
import { Command } from "./command.js";
import type { CommandHost } from "./command.js";
import { ExecContext } from "./context.js";
import { resolveRoute } from "./router.js";
import type { RouteEnv } from "./router.js";
import { collectCommands, defaultUsageRenderer } from "./usage.js";
import type { UsageData, UsageRenderer } from "./usage.js";

const logger = createLogger("App");

const DEFAULT_VERSION = "0.0.1";

export interface AppOptions extends AppInfo {
  /** Runs, unwrapped by filters, when no command matches. */
  notFound?: ActionFunc;
  /** Runs on every populated option object before its handler. */
  validator?: ValidateFunc;
  usageRenderer?: UsageRenderer;
  /** Usage and parse errors go here. Defaults to process.stderr. */
  output?: OutputSink;
}

export interface ExecOptions {
  /** Handed to handlers as ctx.signal; never inspected. */
  signal?: AbortSignal;
}

function normalizeCmdName(name: string): string {
  return name.replace(/^-+/, "");
}

function normalizeVersion(version: string | undefined): string {
  const trimmed = (version ?? "").replace(/^[vV]/, "");
  return trimmed === "" ? DEFAULT_VERSION : trimmed;
}

function programMtime(programPath: string): Date {
  try {
    return statSync(programPath).mtime;
  } catch (err) {
    logger.debug("program file not readable, using current time", {
      programPath,
      error: err instanceof Error ? err.message : String(err),
    });
    return new Date();
  }
}

export class App implements CommandHost {
  readonly root: Command;

  private appName: string;
  private appDescription: string;
  private appVersion: string;
  private compiledAt: Date;
  private authorList: Author[];
  private copyrightText: string;
  private notFoundHandler: ActionFunc | undefined;
  private validatorHook: ValidateFunc | undefined;
  private renderer: UsageRenderer;
  private sink: OutputSink;
  private cachedUsage = "";

  constructor(options: AppOptions = {}) {
    const checked = validateInput(AppInfoSchema, options);
    if (!checked.success) {
      throw new ConfigError(`invalid app options: ${checked.error ?? "unknown error"}`);
    }

    const programPath = options.programPath ?? process.argv[1] ?? "";
    const cmdName = normalizeCmdName(options.cmdName ?? basename(programPath));
    this.root = new Command(cmdName, "", undefined, this);
    this.appName = options.name ?? "";
    this.appDescription = options.description ?? "";
    this.appVersion = normalizeVersion(options.version);
    this.compiledAt = options.compiled ?? (programPath ? programMtime(programPath) : new Date());
    this.authorList = [...(options.authors ?? [])];
    this.copyrightText = options.copyright ?? "";
    this.notFoundHandler = options.notFound;
    this.validatorHook = options.validator;
    this.renderer = options.usageRenderer ?? defaultUsageRenderer;
    this.sink = options.output ?? process.stderr;
    this.refreshUsage();
  }

  // ─── Metadata ───

  get cmdName(): string {
    return this.root.name;
  }

  set cmdName(name: string) {
    this.root.rename(normalizeCmdName(name));
    this.refreshUsage();
  }

  /** Display name; falls back to cmdName. */
  get name(): string {
    return this.appName || this.root.name;
  }

  set name(name: string) {
    this.appName = name;
    this.refreshUsage();
  }

  get description(): string {
    return this.appDescription;
  }

  set description(description: string) {
    this.appDescription = description;
    this.refreshUsage();
  }

  get version(): string {
    return this.appVersion;
  }

  set version(version: string) {
    this.appVersion = normalizeVersion(version);
    this.refreshUsage();
  }

  get compiled(): Date {
    return this.compiledAt;
  }

  set compiled(compiled: Date) {
    this.compiledAt = compiled;
    this.refreshUsage();
  }

  get authors(): readonly Author[] {
    return this.authorList;
  }

  set authors(authors: readonly Author[]) {
    this.authorList = [...authors];
    this.refreshUsage();
  }

  get copyright(): string {
    return this.copyrightText;
  }

  set copyright(copyright: string) {
    this.copyrightText = copyright;
    this.refreshUsage();
  }

  get notFound(): ActionFunc | undefined {
    return this.notFoundHandler;
  }

  set notFound(handler: ActionFunc | undefined) {
    this.notFoundHandler = handler;
  }

  get validator(): ValidateFunc | undefined {
    return this.validatorHook;
  }

  set validator(validator: ValidateFunc | undefined) {
    this.validatorHook = validator;
  }

  get usageRenderer(): UsageRenderer {
    return this.renderer;
  }

  set usageRenderer(renderer: UsageRenderer) {
    this.renderer = renderer;
    this.refreshUsage();
  }

  get output(): OutputSink {
    return this.sink;
  }

  set output(sink: OutputSink) {
    this.sink = sink;
  }

  // ─── Usage ───

  usageText(): string {
    return this.cachedUsage;
  }

  usageData(): UsageData {
    return {
      cmdName: this.root.name,
      name: this.name,
      description: this.appDescription,
      version: this.appVersion,
      compiled: this.compiledAt,
      authors: this.authorList,
      copyright: this.copyrightText,
      commands: collectCommands(this.root),
      globalOptions: formatFlagDefaults([...this.root.filterFlags(), ...this.root.actionFlags()]),
    };
  }

  refreshUsage(): void {
    this.cachedUsage = this.renderer(this.usageData());
  }

  // ─── Tree ───

  /** Add filters to the root; they wrap every command. */
  use(...filters: FilterInput[]): this {
    for (const filter of filters) this.root.addFilter(filter);
    return this;
  }

  addFilter(filter: FilterInput): void {
    this.root.addFilter(filter);
  }

  addSubcommand(name: string, description: string, ...filters: FilterInput[]): Command {
    return this.root.addSubcommand(name, description, ...filters);
  }

  addSubaction(name: string, description: string, action: ActionInput, ...filters: FilterInput[]): Command {
    return this.root.addSubaction(name, description, action, ...filters);
  }

  setAction(action: ActionInput): void {
    this.root.setAction(action);
  }

  // ─── Execution ───

  /**
   * Resolve args to one handler and run it. Never throws: parse failures,
   * unknown commands and handler faults all come back as a Status.
   */
  async exec(args: readonly string[], options: ExecOptions = {}): Promise<Status> {
    const argv = [...args];
    const env: RouteEnv = {
      validator: this.validatorHook,
      notFound: this.notFoundHandler,
      output: this.sink,
      usageText: () => this.cachedUsage,
    };
    try {
      const route = resolveRoute(this.root, env, [this.root.name], argv);
      await route.handler(new ExecContext(argv, route.cmdPath, options.signal));
      return Status.ok();
    } catch (err) {
      const status = Status.from(err);
      if (!(err instanceof StatusError)) {
        logger.warn("handler fault", { error: status.msg });
      }
      return status;
    }
  }

  /** exec() over process arguments; a failure is written out and sets process.exitCode. */
  async run(argv: readonly string[] = process.argv.slice(2), options: ExecOptions = {}): Promise<Status> {
    const status = await this.exec(argv, options);
    if (!status.ok()) {
      this.sink.write(`${this.root.name}: ${status.msg}\n`);
      process.exitCode = status.code > 0 ? status.code : 1;
    }
    return status;
  }
}

export function createApp(options: AppOptions = {}): App {
  return new App(options);
}
