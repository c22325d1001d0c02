#!/usr/bin/env node
/**
 * Rainflow Engine - CLI Entry Point
 * =================================
 * Interactive command-line interface
 */

import * as readline from 'readline';
import { createSessionManager } from '../session/manager';
import { initLogger } from '../utils/logger';
import { initConfig, getConfig } from '../core/config';
import { CommandHandler } from './commands';

// ============================================================================
// COLORS
// ============================================================================

const COLORS = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
};

// ============================================================================
// CLI CLASS
// ============================================================================

export class RainflowCLI {
  private rl: readline.Interface;
  private handler: CommandHandler;
  private running = false;

  constructor(configPath?: string) {
    if (configPath) {
      initConfig(configPath);
    }

    const config = getConfig();

    // Console stays free for the REPL
    const logConfig = config.getLoggingConfig();
    initLogger({
      level: logConfig.level,
      console: false,
      file: logConfig.file,
      filePath: logConfig.filePath,
    });

    this.handler = new CommandHandler(createSessionManager({ config }), config);

    this.rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });
  }

  private displayBanner(): void {
    console.log(`
${COLORS.cyan}╔══════════════════════════════════════════════════════════╗
║                                                          ║
║   ${COLORS.bright}Rainflow Counter${COLORS.cyan}                                       ║
║   ${COLORS.dim}Cycle counting & fatigue damage${COLORS.cyan}                        ║
║                                                          ║
╚══════════════════════════════════════════════════════════╝${COLORS.reset}

${COLORS.dim}Type 'help' for commands, 'exit' to quit${COLORS.reset}
`);
  }

  /**
   * Parse and execute command, false ends the REPL
   */
  executeCommand(input: string): boolean {
    const trimmed = input.trim();
    if (!trimmed) return true;

    const parts = trimmed.split(/\s+/);
    const cmd = parts[0].toLowerCase();
    const args = parts.slice(1);

    switch (cmd) {
      case 'exit':
      case 'quit':
      case 'q':
        return false;

      case 'help':
      case 'h':
      case '?':
        this.handler.help();
        break;

      case 'status':
      case 's':
        this.handler.displayStatus();
        break;

      case 'feed':
      case 'f':
        this.handler.feed(args);
        break;

      case 'load':
        if (args[0]) {
          this.handler.load(args[0]);
        } else {
          console.log(`${COLORS.yellow}Usage: load <filepath>${COLORS.reset}`);
        }
        break;

      case 'finalize':
        this.handler.finalize(args[0]);
        break;

      case 'matrix':
      case 'rfm':
        this.handler.displayMatrix();
        break;

      case 'residue':
        this.handler.displayResidue();
        break;

      case 'rp':
        this.handler.displayRangePair();
        break;

      case 'lc':
        this.handler.displayLevelCrossing();
        break;

      case 'damage':
      case 'd':
        this.handler.displayDamage();
        break;

      case 'symmetric':
        this.handler.makeSymmetric();
        break;

      case 'new':
        this.handler.newSession();
        break;

      case 'config':
        this.handler.displayConfig();
        break;

      default:
        // Bare numbers are fed directly
        if (/^[-+.\d]/.test(cmd)) {
          this.handler.feed(parts);
        } else {
          console.log(`${COLORS.yellow}Unknown command: ${cmd}. Type 'help' for commands.${COLORS.reset}`);
        }
    }

    return true;
  }

  private prompt(): void {
    this.rl.question(`${COLORS.green}rainflow>${COLORS.reset} `, (answer) => {
      const continueRunning = this.executeCommand(answer);

      if (continueRunning && this.running) {
        this.prompt();
      } else {
        this.shutdown();
      }
    });
  }

  start(): void {
    this.running = true;
    this.displayBanner();
    this.handler.displayStatus();
    this.prompt();
  }

  shutdown(): void {
    this.running = false;
    console.log(`\n${COLORS.dim}Goodbye!${COLORS.reset}\n`);
    this.rl.close();
    process.exit(0);
  }
}

// ============================================================================
// MAIN ENTRY POINT
// ============================================================================

export function startCLI(configPath?: string): void {
  const cli = new RainflowCLI(configPath);

  process.on('SIGINT', () => {
    cli.shutdown();
  });

  cli.start();
}

if (require.main === module) {
  const configPath = process.argv[2];
  startCLI(configPath);
}
