#!/usr/bin/env node
/**
 * Location Shortcuts CLI
 *
 * `go` prints the target path so a shell function can change into it:
 *   sc() { cd "$(location-shortcuts go "$1")"; }
 */

import './env.js';

import { existsSync } from 'fs';
import readline from 'readline';
import { getConfigFilePath, resolveConfigBaseDir } from './config-locator.js';
import { getHostEnvironment } from './host.js';
import { addShortcut, createDefaults, editShortcut, getShortcuts, navigateTo, removeShortcut } from './shortcuts.js';
import type { ShortcutMap } from './types.js';

const command = process.argv[2];
const args = process.argv.slice(3);
const flags = new Set(args.filter((a) => a.startsWith('--')));
const positional = args.filter((a) => !a.startsWith('--'));

function confirm(question: string): Promise<boolean> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });
    rl.question(question, (answer) => {
      rl.close();
      resolve(/^y(es)?$/i.test(answer.trim()));
    });
  });
}

function printShortcuts(shortcuts: ShortcutMap): void {
  if (shortcuts.size === 0) {
    console.log('No shortcuts defined.');
    return;
  }

  const names = [...shortcuts.keys()].sort((a, b) => a.localeCompare(b, undefined, { sensitivity: 'base' }));
  const width = Math.max(...names.map((n) => n.length));
  for (const name of names) {
    console.log(`${name.padEnd(width)}  ${shortcuts.get(name) ?? ''}`);
  }
}

function usage(): void {
  console.log(`
Location Shortcuts

Commands:
  list                          Show all shortcuts
  go <name>                     Print the path for <name>
  add <name> [path]             Add a shortcut (path defaults to the current directory)
  edit <name> <path>            Point an existing shortcut somewhere else
  remove <name>                 Delete a shortcut
  reset [--force] [--passthru]  Replace all shortcuts with the defaults for this machine
  where                         Show where shortcuts are stored

Names are letters, digits, "_" and "-", matched case-insensitively.

Shell integration:
  sc() { cd "$(location-shortcuts go "$1")"; }
  `);
}

async function main(): Promise<void> {
  switch (command) {
    case 'list': {
      printShortcuts(await getShortcuts());
      break;
    }

    case 'go': {
      const name = positional[0];
      if (!name) {
        console.error('Usage: location-shortcuts go <name>');
        process.exitCode = 1;
        break;
      }
      const result = await navigateTo(name);
      if (result.ok) {
        console.log(result.value);
      } else {
        process.exitCode = 1;
      }
      break;
    }

    case 'add': {
      const name = positional[0];
      if (!name) {
        console.error('Usage: location-shortcuts add <name> [path]');
        process.exitCode = 1;
        break;
      }
      const host = getHostEnvironment();
      const result = await addShortcut(name, positional[1] ?? host.cwd, host);
      if (result.ok) {
        console.log(`Added ${name} -> ${result.value.get(name) ?? ''}`);
      } else {
        process.exitCode = 1;
      }
      break;
    }

    case 'edit': {
      const [name, target] = positional;
      if (!name || !target) {
        console.error('Usage: location-shortcuts edit <name> <path>');
        process.exitCode = 1;
        break;
      }
      const result = await editShortcut(name, target);
      if (!result.ok) process.exitCode = 1;
      break;
    }

    case 'remove': {
      const name = positional[0];
      if (!name) {
        console.error('Usage: location-shortcuts remove <name>');
        process.exitCode = 1;
        break;
      }
      const result = await removeShortcut(name);
      if (result.ok) {
        console.log(`Removed ${name}`);
      } else {
        process.exitCode = 1;
      }
      break;
    }

    case 'reset': {
      const host = getHostEnvironment();
      const filePath = await getConfigFilePath(host);

      if (existsSync(filePath) && !flags.has('--force')) {
        if (!process.stdin.isTTY) {
          console.error(`Error: ${filePath} exists. Re-run with --force to overwrite it.`);
          process.exitCode = 1;
          break;
        }
        const ok = await confirm(`Overwrite all shortcuts in ${filePath}? [y/N] `);
        if (!ok) {
          console.log('Cancelled.');
          break;
        }
      }

      const defaults = await createDefaults({ passThru: flags.has('--passthru') }, host);
      if (defaults) printShortcuts(defaults);
      break;
    }

    case 'where': {
      const host = getHostEnvironment();
      const { documentsDir, redirected } = resolveConfigBaseDir(host);
      console.log(await getConfigFilePath(host));
      console.log(redirected ? `(OneDrive redirection: ${documentsDir})` : '(no OneDrive redirection)');
      break;
    }

    default:
      usage();
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
