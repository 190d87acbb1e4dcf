import { Command } from "commander";
import chalk from "chalk";
import ora, { type Ora } from "ora";
import { existsSync } from "node:fs";
import { join, resolve } from "node:path";
import { runChecks, projectStatus, verifyStructure } from "../core/checks.js";
import {
  configPathFor,
  getDefaultAgent,
  loadConfig,
  nextstepConfigPathFor,
} from "../core/config-store.js";
import { errorMessage, exitCodeFor, UsageError } from "../core/errors.js";
import { resolveToolPaths } from "../core/paths.js";
import { initProject } from "../core/project-init.js";
import { requireX100Project, setProjectUrl, switchDefaultAgent } from "../core/project-settings.js";
import { AGENT_REGISTRY, DEFAULT_AGENT, getAgentMeta, isKnownAgent, unknownAgentError } from "../core/registry.js";
import {
  disableTemplate,
  enableTemplate,
  enableWorkflow,
  listActive,
  listTemplates,
} from "../core/templates.js";
import { configureNextstep } from "../nextstep/config.js";
import {
  defaultReportPath,
  formatReport,
  reportFileContent,
  saveReport,
} from "../nextstep/formatters.js";
import { runNextstep } from "../nextstep/index.js";
import type { AgentId, ReportFormat, TemplateKind, ToolPaths } from "../types/index.js";
import { confirm, isCancel, select } from "./tui.js";
import {
  agentDashboard,
  debug,
  formatBox,
  hint,
  initStepLine,
  setVerbose,
  tag,
  templateList,
  workflowLines,
} from "./utils.js";

export const VERSION = "0.4.0";
const REPORT_FORMATS: ReportFormat[] = ["text", "json", "markdown"];

function fail(context: string, err: unknown, fallback = 1): never {
  console.error(chalk.red(`${context} error:`), errorMessage(err));
  process.exit(exitCodeFor(err, fallback));
}

/**
 * Paths for the current project, targeting the --ai assistant or the
 * configured default.
 */
function projectPaths(ai: string | undefined): ToolPaths {
  const root = process.cwd();
  const agentId = ai ?? getDefaultAgent(loadConfig(configPathFor(root)));
  if (!isKnownAgent(agentId)) {
    throw unknownAgentError(agentId);
  }
  debug("Project root:", root, "| assistant:", agentId);
  return resolveToolPaths(root, agentId);
}

function activeDirFor(paths: ToolPaths, kind: TemplateKind): string {
  return kind === "command" ? paths.activeCommandsDir : paths.activeAgentsDir;
}

interface InitCliOptions {
  ai?: string;
  name?: string;
  code?: string;
  git: boolean;
}

interface TemplateCliOptions {
  ai?: string;
  yes?: boolean;
}

interface NextstepCliOptions {
  verbose?: boolean;
  format: string;
  save?: boolean;
  output?: string;
  githubToken?: string;
  githubRepo?: string;
  config?: string;
  /** A name from --ai, false from --no-ai. */
  ai?: string | false;
}

function parseFormat(value: string): ReportFormat {
  const format = REPORT_FORMATS.find((f) => f === value);
  if (!format) {
    throw new UsageError(`Invalid format "${value}": choose one of ${REPORT_FORMATS.join(", ")}`);
  }
  return format;
}

function registerTemplateCommands(
  program: Command,
  kind: TemplateKind,
  description: string
): Command {
  const group = program.command(kind).description(description);
  const Kind = kind === "command" ? "Command" : "Agent";

  group
    .command("list")
    .description(`List available ${kind}s and mark the active ones`)
    .option("--ai <agent>", "Target AI assistant folder")
    .action((options: TemplateCliOptions) => {
      try {
        const paths = projectPaths(options.ai);
        console.log(templateList(listTemplates(paths, kind), kind, activeDirFor(paths, kind)));
      } catch (err) {
        fail(Kind, err);
      }
    });

  group
    .command("enable [name]")
    .description(`Copy a ${kind} into the assistant's active folder`)
    .option("--ai <agent>", "Target AI assistant folder")
    .action(async (name: string | undefined, options: TemplateCliOptions) => {
      try {
        const paths = projectPaths(options.ai);
        let target = name;
        if (target === undefined) {
          if (!process.stdin.isTTY) {
            throw new UsageError(`Missing ${kind} name. Run 'x100 ${kind} list' to see what is available.`);
          }
          const picked = await select({
            message: `Select a ${kind} to enable`,
            options: listTemplates(paths, kind).map((t) => ({
              value: t.name,
              label: t.displayName,
              hint: t.description,
              active: t.active,
            })),
          });
          if (isCancel(picked)) {
            console.log(chalk.dim("  Cancelled."));
            return;
          }
          target = picked;
        }

        const result = enableTemplate(paths, kind, target);
        debug("Copied to", result.target);
        if (result.alreadyActive) {
          console.log(`  ${tag("OK")} ${result.name} ${chalk.dim("already active, refreshed from the pool")}`);
        } else {
          console.log(`  ${tag("ENABLED")} ${result.name} ${chalk.dim(`-> ${result.target}`)}`);
        }
      } catch (err) {
        fail(Kind, err);
      }
    });

  group
    .command("disable [name]")
    .description(`Remove a ${kind} from the assistant's active folder`)
    .option("--ai <agent>", "Target AI assistant folder")
    .option("-y, --yes", "Skip the confirmation prompt")
    .action(async (name: string | undefined, options: TemplateCliOptions) => {
      try {
        const paths = projectPaths(options.ai);
        const interactive = process.stdin.isTTY === true;
        let target = name;
        if (target === undefined) {
          if (!interactive) {
            throw new UsageError(`Missing ${kind} name. Run 'x100 ${kind} list' to see what is active.`);
          }
          const active = listActive(paths, kind);
          if (active.length === 0) {
            console.log(chalk.dim(`  No active ${kind}s.`));
            return;
          }
          const picked = await select({
            message: `Select a ${kind} to disable`,
            options: active.map((n) => ({ value: n, label: n })),
          });
          if (isCancel(picked)) {
            console.log(chalk.dim("  Cancelled."));
            return;
          }
          target = picked;
        }

        if (interactive && !options.yes && !(await confirm(`Disable ${kind} ${target}?`))) {
          console.log(chalk.dim("  Cancelled."));
          return;
        }

        const result = disableTemplate(paths, kind, target);
        if (result.removed) {
          console.log(`  ${tag("DISABLED")} ${result.name}`);
        } else {
          console.log(`  ${tag("SKIP")} ${result.name} ${chalk.dim("is not active")}`);
        }
      } catch (err) {
        fail(Kind, err);
      }
    });

  return group;
}

/**
 * A fresh commander program with every x100 command registered.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("x100")
    .description("Prompt assets and project health for AI-assisted development")
    .version(VERSION)
    .enablePositionalOptions()
    .option("--verbose", "Show detailed debug output")
    .hook("preAction", () => {
      if (program.opts<{ verbose?: boolean }>().verbose) setVerbose(true);
    });

  // --- init ---
  program
    .command("init [dir]")
    .aliases(["initialize", "init-project"])
    .description("Scaffold a project and write .x100/config.json")
    .option("--ai <agent>", "Default AI assistant")
    .option("--name <name>", "Project name (defaults to the directory name)")
    .option("--code <code>", "Project code (defaults to the slugified name)")
    .option("--no-git", "Skip git init")
    .action(async (dir: string | undefined, options: InitCliOptions) => {
      const root = resolve(dir ?? ".");
      const spinner = ora(`Initializing ${root}...`).start();
      try {
        const agentId: AgentId = options.ai && isKnownAgent(options.ai) ? options.ai : DEFAULT_AGENT;
        const paths = resolveToolPaths(root, agentId);
        debug("Resources:", paths.resourcesDir);
        const { steps, config } = await initProject(
          paths,
          { ai: options.ai, name: options.name, code: options.code, noGit: !options.git }
        );
        spinner.succeed(`Initialized ${chalk.bold(config.project_name ?? root)}`);

        console.log();
        for (const step of steps) console.log(initStepLine(step, root));
        console.log();

        const defaultAgent = getDefaultAgent(config);
        console.log(
          formatBox(
            [
              `${chalk.dim("Project:")}    ${config.project_name} (${config.project_code})`,
              `${chalk.dim("Assistant:")}  ${getAgentMeta(defaultAgent)?.name ?? defaultAgent} (${defaultAgent})`,
              "",
              `Next: ${chalk.bold("x100 workflow-enable")} to activate the standard workflow`,
              `      ${chalk.bold("x100 check")} to verify your tools`,
            ].join("\n"),
            "x100 project ready"
          )
        );
        if (steps.some((s) => s.status === "failed")) process.exit(2);
      } catch (err) {
        spinner.fail("Init failed");
        fail("Init", err, 2);
      }
    });

  // --- command / agent ---
  registerTemplateCommands(program, "command", "Manage slash commands");
  const agentGroup = registerTemplateCommands(
    program,
    "agent",
    "Manage agent definitions and the default AI assistant"
  );

  agentGroup
    .command("switch-default [agent]")
    .description("Change the project's default AI assistant")
    .action(async (agent: string | undefined) => {
      try {
        const root = process.cwd();
        requireX100Project(root);
        let target = agent;
        if (target === undefined) {
          if (!process.stdin.isTTY) {
            throw new UsageError("Missing assistant id. Run 'x100 agent registered' to see the options.");
          }
          const current = getDefaultAgent(loadConfig(configPathFor(root)));
          const picked = await select({
            message: "Select the default AI assistant",
            options: Object.values(AGENT_REGISTRY).map((meta) => ({
              value: meta.id,
              label: meta.id,
              hint: meta.name,
              active: meta.id === current,
            })),
          });
          if (isCancel(picked)) {
            console.log(chalk.dim("  Cancelled."));
            return;
          }
          target = picked;
        }

        const result = switchDefaultAgent(configPathFor(root), target);
        if (!result.changed) {
          console.log(`  ${tag("OK")} ${result.current} is already the default`);
          return;
        }
        console.log(`  ${tag("OK")} default assistant ${result.previous} -> ${chalk.bold(result.current)}`);
        if (!result.folderExists) {
          console.log(
            `  ${hint(`${AGENT_REGISTRY[result.current].folder} does not exist yet; run 'x100 workflow-enable' to populate it`)}`
          );
        }
      } catch (err) {
        fail("Agent", err);
      }
    });

  agentGroup
    .command("registered")
    .description("List the AI assistants x100 knows about")
    .action(() => {
      try {
        const root = process.cwd();
        const current = getDefaultAgent(loadConfig(configPathFor(root)));
        console.log(
          agentDashboard(
            Object.values(AGENT_REGISTRY).map((meta) => ({
              id: meta.id,
              name: meta.name,
              folder: meta.folder,
              isDefault: meta.id === current,
              folderExists: existsSync(join(root, meta.folder)),
            }))
          )
        );
      } catch (err) {
        fail("Agent", err);
      }
    });

  // --- workflow-enable ---
  program
    .command("workflow-enable")
    .description("Activate the standard commands and agents of the x100 workflow")
    .option("--ai <agent>", "Target AI assistant folder")
    .action((options: { ai?: string }) => {
      try {
        const paths = projectPaths(options.ai);
        const items = enableWorkflow(paths);
        console.log();
        for (const line of workflowLines(items)) console.log(line);
        console.log();
        const missing = items.filter((i) => i.status === "missing").length;
        if (missing > 0) {
          console.log(chalk.yellow(`  ${missing} item(s) missing from ${paths.resourcesDir}`));
        } else {
          console.log(chalk.green("  Workflow enabled."));
        }
      } catch (err) {
        fail("Workflow", err);
      }
    });

  // --- project ---
  const projectGroup = program.command("project").description("Project settings");

  projectGroup
    .command("set-url <url>")
    .description("Link a GitHub project board URL")
    .action((url: string) => {
      try {
        const { id } = setProjectUrl(configPathFor(process.cwd()), url);
        console.log(`  ${tag("OK")} project url saved ${chalk.dim(id ? `(id ${id})` : "(no project id in URL)")}`);
      } catch (err) {
        fail("Project", err);
      }
    });

  projectGroup
    .command("info")
    .description("Show the project configuration")
    .action(() => {
      try {
        const root = process.cwd();
        requireX100Project(root);
        const config = loadConfig(configPathFor(root));
        const rows: Array<[string, string]> = [
          ["Name", config.project_name ?? chalk.dim("not set")],
          ["Code", config.project_code ?? chalk.dim("not set")],
          ["Default assistant", getDefaultAgent(config)],
          ["Backend", config.backend ?? chalk.dim("not set")],
          ["Frontend", config.frontend ?? chalk.dim("not set")],
          ["Project URL", config.project?.url ?? chalk.dim("not set")],
          ["Project ID", config.project?.id || chalk.dim("not set")],
        ];
        console.log();
        for (const [label, value] of rows) {
          console.log(`  ${chalk.dim(`${label}:`.padEnd(20))}${value}`);
        }
        console.log();
      } catch (err) {
        fail("Project", err);
      }
    });

  // --- check / verify / status ---
  program
    .command("check")
    .description("Check for required tools, assistants and community files")
    .action(() => {
      try {
        const root = process.cwd();
        const { tracker, tips } = runChecks(root, loadConfig(configPathFor(root)));
        console.log();
        console.log(tracker.render());
        console.log();
        for (const tip of tips) console.log(`  ${hint(tip)}`);
        if (tips.length > 0) console.log();
      } catch (err) {
        fail("Check", err);
      }
    });

  program
    .command("verify")
    .description("Verify the project layout")
    .action(() => {
      try {
        const checks = verifyStructure(process.cwd());
        console.log();
        for (const check of checks) {
          console.log(`  ${check.ok ? tag("OK") : tag("MISSING")} ${check.name}`);
        }
        console.log();
        const missing = checks.filter((c) => !c.ok).length;
        if (missing > 0) {
          console.log(chalk.yellow(`  ${missing} item(s) missing. Run 'x100 init' to create them.`));
          process.exit(1);
        }
        console.log(chalk.green("  Project structure looks good."));
      } catch (err) {
        fail("Verify", err);
      }
    });

  program
    .command("status")
    .description("Show project and workflow status")
    .option("--ai <agent>", "Target AI assistant folder")
    .action((options: { ai?: string }) => {
      try {
        const paths = projectPaths(options.ai);
        const status = projectStatus(paths, loadConfig(paths.configPath));
        const yesNo = (v: boolean) => (v ? chalk.green("yes") : chalk.red("no"));
        console.log();
        console.log(`  ${chalk.dim("x100 project:".padEnd(20))}${yesNo(status.isX100Project)}`);
        console.log(`  ${chalk.dim("Git repository:".padEnd(20))}${yesNo(status.isGitRepo)}`);
        console.log(`  ${chalk.dim("Default assistant:".padEnd(20))}${status.defaultAgent}`);
        console.log(`  ${chalk.dim("Active commands:".padEnd(20))}${status.activeCommands}`);
        console.log(`  ${chalk.dim("Active agents:".padEnd(20))}${status.activeAgents}`);
        console.log();
        if (!status.isX100Project) console.log(`  ${hint("run 'x100 init' to set up this directory")}\n`);
      } catch (err) {
        fail("Status", err);
      }
    });

  // --- nextstep-setup ---
  program
    .command("nextstep-setup")
    .description("Write .x100/nextstep.json")
    .option("--github-repo <owner/repo>", "Repository to read issues and PRs from")
    .option("--coverage-threshold <pct>", "Coverage below this lowers the quality score")
    .option("--ai <agent>", "AI assistant used by nextstep")
    .action((options: { githubRepo?: string; coverageThreshold?: string; ai?: string }) => {
      try {
        const root = process.cwd();
        requireX100Project(root);
        const projectAgent = getDefaultAgent(loadConfig(configPathFor(root)));
        const path = nextstepConfigPathFor(root);
        const config = configureNextstep(path, projectAgent, options);
        console.log(`  ${tag("OK")} ${path}`);
        console.log(`  ${chalk.dim("Coverage threshold:".padEnd(22))}${config.analysis.coverageThreshold}%`);
        console.log(
          `  ${chalk.dim("GitHub:".padEnd(22))}${config.github.enabled ? config.github.repo ?? "enabled" : "disabled"}`
        );
        console.log(`  ${chalk.dim("AI assistant:".padEnd(22))}${config.defaultAiAgent}`);
        if (config.github.enabled) {
          console.log(`  ${hint(`export ${config.github.tokenEnv} before running 'x100 nextstep'`)}`);
        }
      } catch (err) {
        fail("Nextstep setup", err);
      }
    });

  // --- nextstep ---
  program
    .command("nextstep")
    .description("Analyze project health and recommend next steps")
    .option("-v, --verbose", "Include detailed statistics and debug output")
    .option("-f, --format <format>", "Output format: text, json or markdown", "text")
    .option("-s, --save", "Save the report to nextstep_report_<timestamp>")
    .option("-o, --output <path>", "Save the report to this path")
    .option("--github-token <token>", "GitHub token (default: $GITHUB_TOKEN or $GH_TOKEN)")
    .option("--github-repo <owner/repo>", "Repository for issue and PR status")
    .option("-c, --config <path>", "Path to nextstep.json")
    .option("--ai <agent>", "AI assistant to ask for insights")
    .option("--no-ai", "Rule-based analysis only")
    .action(async (options: NextstepCliOptions) => {
      const progress: { spinner?: Ora } = {};
      try {
        // --verbose before the command name lands on the root program
        const verbose =
          options.verbose === true || program.opts<{ verbose?: boolean }>().verbose === true;
        if (verbose) setVerbose(true);
        const format = parseFormat(options.format);
        const root = process.cwd();
        const now = new Date();
        debug("Project root:", root, "| format:", format);

        const report = await runNextstep(
          root,
          {
            configPath: options.config ? resolve(options.config) : undefined,
            githubToken: options.githubToken,
            githubRepo: options.githubRepo,
            ai: typeof options.ai === "string" ? options.ai : undefined,
            useAi: options.ai !== false,
            now,
          },
          {
            onStepStart: (label) => {
              progress.spinner = ora({ text: `${label}...`, isSilent: format !== "text" }).start();
            },
            onStepEnd: (label) => {
              progress.spinner?.succeed(label);
              progress.spinner = undefined;
            },
            debug: (message) => debug(message),
          }
        );

        if (format === "text") console.log();
        console.log(formatReport(report, format, verbose));

        if (options.save || options.output) {
          const path = options.output ? resolve(options.output) : defaultReportPath(format, now, root);
          saveReport(reportFileContent(report, format, verbose), path);
          if (format === "text") {
            console.log();
            console.log(chalk.green(`Report saved to ${path}`));
          }
        }
      } catch (err) {
        progress.spinner?.fail();
        fail("Nextstep", err, 3);
      }
    });

  return program;
}
