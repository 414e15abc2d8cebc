import fs from "fs";
import path from "path";
import { createRequire } from "module";
import type { Command } from "commander";
import { errorMessage } from "../errors";
import { getRepoRoot } from "../paths";
import { validateJson, type ValidationResult } from "../validation/validate";
import { examplePlugin } from "./example";
import type { AnvilPlugin, PluginContext, PluginLoadReport, PluginSource } from "./types";

export type { AnvilPlugin, PluginContext, PluginLoadReport, PluginSource } from "./types";

export const BUILTIN_PLUGINS: readonly AnvilPlugin[] = [examplePlugin];

const MANIFEST_SCHEMA = "plugin-manifest.schema.json";

export type PluginManifest = {
  packageName: string;
  pluginName: string;
  packageDir: string;
  entry: string;
};

export type DiscoveryProblem = {
  packageDir: string;
  error: string;
};

export type DiscoveryResult = {
  manifests: PluginManifest[];
  problems: DiscoveryProblem[];
};

type Validator = (schemaFile: string, data: unknown) => ValidationResult;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function pluginSearchRoots(cwd: string): string[] {
  const roots = [path.join(cwd, "node_modules"), path.join(getRepoRoot(), "node_modules")].map((root) =>
    path.resolve(root)
  );
  return [...new Set(roots)];
}

function packageDirs(nodeModules: string): string[] {
  if (!fs.existsSync(nodeModules)) {
    return [];
  }
  const dirs: string[] = [];
  for (const entry of fs.readdirSync(nodeModules, { withFileTypes: true })) {
    if (entry.name.startsWith(".") || !(entry.isDirectory() || entry.isSymbolicLink())) {
      continue;
    }
    const full = path.join(nodeModules, entry.name);
    if (entry.name.startsWith("@")) {
      for (const scoped of fs.readdirSync(full, { withFileTypes: true })) {
        if (scoped.isDirectory() || scoped.isSymbolicLink()) {
          dirs.push(path.join(full, scoped.name));
        }
      }
      continue;
    }
    dirs.push(full);
  }
  return dirs;
}

function readManifest(packageDir: string, validate: Validator): PluginManifest | DiscoveryProblem | null {
  const pkgPath = path.join(packageDir, "package.json");
  if (!fs.existsSync(pkgPath)) {
    return null;
  }
  let pkg: unknown;
  try {
    pkg = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
  } catch (error) {
    return { packageDir, error: errorMessage(error) };
  }
  if (!isRecord(pkg) || pkg.anvil === undefined) {
    return null;
  }
  const result = validate(MANIFEST_SCHEMA, pkg);
  if (!result.valid) {
    return { packageDir, error: `invalid plugin manifest (${result.errors.join("; ")})` };
  }
  const packageName = typeof pkg.name === "string" ? pkg.name : path.basename(packageDir);
  const anvil = isRecord(pkg.anvil) ? pkg.anvil : {};
  const plugin = typeof anvil.plugin === "string" ? anvil.plugin : "";
  const pluginName =
    typeof anvil.name === "string" ? anvil.name : packageName.replace(/^@[^/]+\//, "").replace(/^anvil-plugin-/, "");
  return { packageName, pluginName, packageDir, entry: path.resolve(packageDir, plugin) };
}

/**
 * Finds installed packages whose package.json carries an `anvil.plugin` entry.
 * The first root that provides a package name wins.
 */
export function discoverPlugins(searchRoots: string[], validate: Validator = validateJson): DiscoveryResult {
  const manifests: PluginManifest[] = [];
  const problems: DiscoveryProblem[] = [];
  const seen = new Set<string>();
  for (const root of searchRoots) {
    let dirs: string[];
    try {
      dirs = packageDirs(root);
    } catch (error) {
      problems.push({ packageDir: root, error: errorMessage(error) });
      continue;
    }
    for (const dir of dirs) {
      const manifest = readManifest(dir, validate);
      if (manifest === null) {
        continue;
      }
      if ("error" in manifest) {
        problems.push(manifest);
        continue;
      }
      if (seen.has(manifest.packageName)) {
        continue;
      }
      seen.add(manifest.packageName);
      manifests.push(manifest);
    }
  }
  return { manifests, problems };
}

function pluginFromModule(loaded: unknown, name: string): AnvilPlugin | null {
  const candidates = isRecord(loaded) && isRecord(loaded.default) ? [loaded, loaded.default] : [loaded];
  for (const candidate of candidates) {
    if (isRecord(candidate) && typeof candidate.register === "function") {
      const register = candidate.register;
      return {
        name,
        register: (program, context) => {
          register(program, context);
        }
      };
    }
  }
  return null;
}

function loadExternalPlugin(manifest: PluginManifest): unknown {
  const requireFromPackage = createRequire(path.join(manifest.packageDir, "package.json"));
  return requireFromPackage(manifest.entry);
}

export type RegisterPluginsOptions = {
  external: boolean;
  searchRoots?: string[];
};

function registerOne(
  program: Command,
  context: PluginContext,
  plugin: AnvilPlugin,
  source: PluginSource,
  report: PluginLoadReport[]
): void {
  try {
    plugin.register(program, context);
    report.push({ name: plugin.name, source, status: "registered" });
  } catch (error) {
    report.push({ name: plugin.name, source, status: "failed", error: errorMessage(error) });
  }
}

/** Registers built-in plugins, then (optionally) installed ones. Never throws. */
export function registerPlugins(program: Command, context: PluginContext, options: RegisterPluginsOptions): PluginLoadReport[] {
  const report: PluginLoadReport[] = [];
  for (const plugin of BUILTIN_PLUGINS) {
    registerOne(program, context, plugin, "built-in", report);
  }

  if (options.external) {
    const discovery = discoverPlugins(options.searchRoots ?? pluginSearchRoots(context.cwd));
    for (const problem of discovery.problems) {
      report.push({ name: path.basename(problem.packageDir), source: "external", status: "failed", error: problem.error });
    }
    for (const manifest of discovery.manifests) {
      let loaded: unknown;
      try {
        loaded = loadExternalPlugin(manifest);
      } catch (error) {
        report.push({ name: manifest.pluginName, source: "external", status: "failed", error: errorMessage(error) });
        continue;
      }
      const plugin = pluginFromModule(loaded, manifest.pluginName);
      if (!plugin) {
        report.push({ name: manifest.pluginName, source: "external", status: "skipped", reason: "no register export" });
        continue;
      }
      registerOne(program, context, plugin, "external", report);
    }
  }

  printReport(context, report);
  return report;
}

function printReport(context: PluginContext, report: PluginLoadReport[]): void {
  const { terminal } = context;
  for (const entry of report) {
    switch (entry.status) {
      case "registered":
        if (context.verbose) {
          terminal.print(`Registered ${entry.source} plugin: ${entry.name}`, "dim");
        }
        break;
      case "skipped":
        if (context.verbose) {
          terminal.print(`Skipped ${entry.source} plugin ${entry.name}: ${entry.reason}`, "yellow");
        }
        break;
      case "failed":
        terminal.error("ANV-0601", `Failed to load ${entry.source} plugin ${entry.name}: ${entry.error}`);
        break;
    }
  }
}
