#!/usr/bin/env node
import { Command } from "commander";
import {
  mcpDisableCommand,
  mcpDoctorCommand,
  mcpEnableCommand,
  mcpListCommand,
} from "./commands/mcp.js";
import {
  skillsInstallCommand,
  skillsListCommand,
  skillsRemoveCommand,
} from "./commands/skills.js";
import { appsCheckCommand, appsListCommand } from "./commands/apps.js";
import { exitWithError } from "./commands/shared.js";
import { CLI_NAME, VERSION } from "./utils/constants.js";

const program = new Command();

program
  .name(CLI_NAME)
  .description("Manage MCP servers, skills and versions of your AI coding CLIs")
  .version(VERSION, "-v, --version", "Print version");

const mcp = program
  .command("mcp")
  .description("Manage MCP servers across AI CLI tools");

mcp
  .command("list", { isDefault: true })
  .description("List MCP servers and their status across tools")
  .action(mcpListCommand);

mcp
  .command("enable")
  .description("Enable an MCP server across all installed tools")
  .argument("<server>", "Server to enable (e.g. 'linear', 'playwright', or 'all')")
  .action(mcpEnableCommand);

mcp
  .command("disable")
  .description("Disable an MCP server across all installed tools")
  .argument("<server>", "Server to disable (e.g. 'linear', 'playwright', or 'all')")
  .action(mcpDisableCommand);

mcp
  .command("doctor")
  .description("Show installed tools and their config paths")
  .action(mcpDoctorCommand);

const skills = program
  .command("skills")
  .description("Manage skills across AI CLI tools");

skills
  .command("list", { isDefault: true })
  .description("List installed skills per agent")
  .option("-a, --agent <id>", "Only show one agent (e.g. 'claude', 'gemini')")
  .action(skillsListCommand);

skills
  .command("install")
  .description("Install skill(s) from a git repository")
  .argument("<repo>", "Repository (owner/repo or full URL)")
  .option("-a, --agent <id>", "Install into one agent only")
  .action(skillsInstallCommand);

skills
  .command("remove")
  .description("Remove an installed skill")
  .argument("<skill>", "Skill name to remove")
  .option("-a, --agent <id>", "Remove from one agent only")
  .action(skillsRemoveCommand);

const apps = program
  .command("apps")
  .description("Show installed AI CLI tools and their versions");

apps
  .command("list", { isDefault: true })
  .description("List installed tools, with available updates")
  .action(appsListCommand);

apps
  .command("check")
  .description("Check latest versions available")
  .action(appsCheckCommand);

program.parseAsync().catch((err: unknown) => exitWithError(err));
