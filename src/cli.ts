#!/usr/bin/env node

import { Command } from 'commander';
import { register, repos, status, remove } from './commands/repos.js';
import { sync } from './commands/sync.js';
import { projects, project, entrypoints } from './commands/projects.js';
import { analyze } from './commands/analyze.js';
import { daemon } from './commands/daemon.js';

const VERSION = '0.4.0';

const program = new Command();

program
  .name('reposcope')
  .description('Keep git repositories in sync and catalogue the projects inside them')
  .version(VERSION);

program
  .command('register <name> <url>')
  .description('Register a repository to sync')
  .option('-b, --branch <branch>', 'Branch to track (default: main)')
  .option('-k, --key <path>', 'SSH private key file for this repository')
  .option('--public-key <path>', 'Matching SSH public key file')
  .option('--replace', 'Replace an existing registration with the same name')
  .option('--json', 'Output as JSON')
  .action(register);

program
  .command('repos')
  .description('List registered repositories with their sync state')
  .option('--json', 'Output as JSON')
  .action(repos);

program
  .command('status [name]')
  .description('Show sync status of one repository, or overall statistics')
  .option('--json', 'Output as JSON')
  .action(status);

program
  .command('remove <name>')
  .description('Unregister a repository and delete its clone, credentials and metadata')
  .action(remove);

program
  .command('sync [name]')
  .description('Sync and analyze one repository, or all of them')
  .option('--json', 'Output as JSON')
  .action(sync);

program
  .command('projects')
  .description('List detected projects')
  .option('-r, --repository <name>', 'Only projects in this repository')
  .option('-e, --ecosystem <ecosystem>', 'Filter by ecosystem (python, node, jvm, rust, go, dotnet, cmake)')
  .option('-t, --type <type>', 'Filter by type (web-app, api, cli, library, microservice, unknown)')
  .option('--json', 'Output as JSON')
  .action(projects);

program
  .command('project <id>')
  .description('Show metadata of one project')
  .option('--json', 'Output as JSON')
  .action(project);

program
  .command('entrypoints <id>')
  .description('List entry points of one project')
  .option('-k, --kind <kind>', 'Filter by kind (function, class, method, route)')
  .option('--json', 'Output as JSON')
  .action(entrypoints);

program
  .command('analyze <path>')
  .description('Analyze a local directory without registering it')
  .option('--json', 'Output as JSON')
  .action(analyze);

program
  .command('daemon')
  .description('Run scheduled sync passes until interrupted')
  .option('-i, --interval <minutes>', 'Minutes between passes')
  .option('-q, --quiet', 'Do not echo log entries to stderr')
  .action(daemon);

program.parse();
