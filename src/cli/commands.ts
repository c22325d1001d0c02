/**
 * Rainflow Engine - CLI Commands
 * ==============================
 * Command handlers for the CLI interface
 */

import * as fs from 'fs';
import * as path from 'path';
import { CountingState, ResidualMethod, RESIDUAL_METHODS } from '../types';
import { ConfigManager } from '../core/config';
import { SessionNotFoundError, isRainflowError } from '../core/errors';
import { SessionManager } from '../session/manager';

// ============================================================================
// DISPLAY HELPERS
// ============================================================================

const COLORS = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
};

function colorState(state: CountingState): string {
  switch (state) {
    case 'init':
    case 'init0':
      return `${COLORS.dim}${state.toUpperCase()}${COLORS.reset}`;
    case 'busy':
    case 'busy_interim':
      return `${COLORS.cyan}${state.toUpperCase()}${COLORS.reset}`;
    case 'finalize':
    case 'finished':
      return `${COLORS.green}${state.toUpperCase()}${COLORS.reset}`;
    case 'error':
      return `${COLORS.red}ERROR${COLORS.reset}`;
  }
}

function formatNumber(value: number): string {
  if (value === 0) return '0';
  const abs = Math.abs(value);
  return abs >= 1e-3 && abs < 1e6 ? String(Number(value.toFixed(6))) : value.toExponential(4);
}

/**
 * Parse whitespace or comma separated numbers, null when a token is not a finite number
 */
export function parseValues(text: string): number[] | null {
  const tokens = text.split(/[\s,;]+/).filter((t) => t.length > 0);
  const values = tokens.map(Number);
  return values.every(Number.isFinite) ? values : null;
}

export function isResidualMethod(value: string): value is ResidualMethod {
  return RESIDUAL_METHODS.some((method) => method === value);
}

// ============================================================================
// COMMAND HANDLERS
// ============================================================================

export class CommandHandler {
  private currentId: string;

  constructor(
    private readonly manager: SessionManager,
    private readonly config: ConfigManager,
  ) {
    this.currentId = this.manager.createSession({ name: 'cli' }).id;
  }

  getCurrentSessionId(): string {
    return this.currentId;
  }

  /**
   * Feed numbers given on the command line
   */
  feed(args: string[]): boolean {
    const values = parseValues(args.join(' '));
    if (!values || values.length === 0) {
      console.log(`${COLORS.red}Usage: feed <value> [value...] (finite numbers)${COLORS.reset}`);
      return false;
    }
    return this.feedValues(values, 'command line');
  }

  /**
   * Feed a text file of numbers
   */
  load(filePath: string): boolean {
    const absolutePath = path.resolve(filePath);
    if (!fs.existsSync(absolutePath)) {
      console.log(`${COLORS.red}File not found: ${absolutePath}${COLORS.reset}`);
      return false;
    }

    const values = parseValues(fs.readFileSync(absolutePath, 'utf-8'));
    if (!values) {
      console.log(`${COLORS.red}File contains non-numeric values: ${absolutePath}${COLORS.reset}`);
      return false;
    }
    return this.feedValues(values, path.basename(absolutePath));
  }

  private feedValues(values: number[], source: string): boolean {
    return this.run(() => {
      const summary = this.manager.feed(this.currentId, values);
      console.log(
        `${COLORS.green}✓${COLORS.reset} Fed ${values.length} value(s) from ${source}, ` +
          `${summary.samples} total, ${formatNumber(summary.cycles)} cycle(s) closed`,
      );
    });
  }

  finalize(method?: string): boolean {
    if (method !== undefined && !isResidualMethod(method)) {
      console.log(`${COLORS.red}Unknown residual method: ${method}${COLORS.reset}`);
      console.log(`  Available: ${RESIDUAL_METHODS.join(', ')}`);
      return false;
    }

    return this.run(() => {
      const summary = this.manager.finalize(this.currentId, method);
      console.log(`${COLORS.green}✓${COLORS.reset} Finalized (${summary.residualMethod})`);
      console.log(`  Damage: ${formatNumber(summary.damage)} (residue ${formatNumber(summary.damageResidue)})`);
    });
  }

  /**
   * Display current status
   */
  displayStatus(): void {
    const summary = this.manager.getSummary(this.currentId);

    console.log(`\n${'─'.repeat(50)}`);
    console.log(`${COLORS.bright}Session Status${COLORS.reset}  ${COLORS.dim}${summary.id}${COLORS.reset}`);
    console.log(`${'─'.repeat(50)}`);
    console.log(`  State: ${colorState(summary.state)}`);
    if (summary.error) {
      console.log(`  Error: ${COLORS.red}${summary.error}${COLORS.reset}`);
    }
    console.log(`  Samples: ${summary.samples}`);
    console.log(`  Cycles: ${formatNumber(summary.cycles)}`);
    console.log(`  Residue: ${summary.residueLength} point(s)`);
    console.log(`  Damage: ${formatNumber(summary.damage)}`);
    console.log(`${'─'.repeat(50)}\n`);
  }

  /**
   * Non-zero matrix entries as from -> to: counts
   */
  displayMatrix(): void {
    const items = this.manager.getSession(this.currentId).rfmGet();
    if (!items) {
      console.log(`${COLORS.yellow}Rainflow matrix is not enabled${COLORS.reset}`);
      return;
    }
    if (items.length === 0) {
      console.log(`${COLORS.dim}Rainflow matrix is empty${COLORS.reset}`);
      return;
    }

    console.log(`\n${COLORS.bright}Rainflow Matrix${COLORS.reset} (from → to: counts)`);
    for (const item of items) {
      console.log(`  ${item.from} → ${item.to}: ${formatNumber(item.counts)}`);
    }
  }

  displayResidue(): void {
    const residue = this.manager.getSession(this.currentId).getResidue(true);
    if (residue.length === 0) {
      console.log(`${COLORS.dim}Residue is empty${COLORS.reset}`);
      return;
    }

    console.log(`\n${COLORS.bright}Residue${COLORS.reset} (${residue.length})`);
    for (const tp of residue) {
      console.log(`  #${tp.pos}  ${formatNumber(tp.value)}  ${COLORS.dim}class ${tp.cls}${COLORS.reset}`);
    }
  }

  displayRangePair(): void {
    const rp = this.manager.getSession(this.currentId).getRangePair();
    if (!rp) {
      console.log(`${COLORS.yellow}Range pair histogram is not enabled${COLORS.reset}`);
      return;
    }

    console.log(`\n${COLORS.bright}Range Pair${COLORS.reset} (range: Sa counts)`);
    rp.counts.forEach((counts, range) => {
      if (counts) console.log(`  ${range}: ${formatNumber(rp.amplitudes[range])}  ${formatNumber(counts)}`);
    });
  }

  displayLevelCrossing(): void {
    const lc = this.manager.getSession(this.currentId).getLevelCrossing();
    if (!lc) {
      console.log(`${COLORS.yellow}Level crossing histogram is not enabled${COLORS.reset}`);
      return;
    }

    console.log(`\n${COLORS.bright}Level Crossing${COLORS.reset} (level: counts)`);
    lc.counts.forEach((counts, i) => {
      if (counts) console.log(`  ${formatNumber(lc.levels[i])}: ${formatNumber(counts)}`);
    });
  }

  displayDamage(): void {
    const summary = this.manager.getSummary(this.currentId);
    console.log(`  Damage: ${formatNumber(summary.damage)}`);
    console.log(`  Residue damage: ${formatNumber(summary.damageResidue)}`);
  }

  makeSymmetric(): boolean {
    const session = this.manager.getSession(this.currentId);
    if (!session.rfmMakeSymmetric()) {
      console.log(`${COLORS.red}Cannot fold matrix: ${session.getError() ?? 'session not ready'}${COLORS.reset}`);
      return false;
    }
    console.log(`${COLORS.green}✓${COLORS.reset} Matrix folded onto its upper triangle`);
    return true;
  }

  /**
   * Replace the current session by a fresh one with the configured defaults
   */
  newSession(): void {
    const previous = this.currentId;
    this.currentId = this.manager.createSession({ name: 'cli' }).id;
    this.manager.deleteSession(previous);
    console.log(`${COLORS.green}✓${COLORS.reset} New session ${this.currentId}`);
  }

  displayConfig(): void {
    const counting = this.config.getCountingConfig();
    const woehler = this.config.getWoehlerConfig();

    console.log(`\n${COLORS.bright}Counting${COLORS.reset}`);
    console.log(`  Classes: ${counting.classCount} × ${counting.classWidth} from ${counting.classOffset}`);
    console.log(`  Hysteresis: ${counting.hysteresis}`);
    console.log(`  Method: ${counting.countingMethod}, residue: ${counting.residualMethod}`);
    console.log(`${COLORS.bright}Woehler${COLORS.reset}`);
    console.log(`  sx=${woehler.sx} nx=${woehler.nx} k=${woehler.k}`);
  }

  help(): void {
    console.log(`
${COLORS.bright}Commands${COLORS.reset}
  feed <v1> [v2 ...]   Feed samples (space or comma separated)
  load <file>          Feed samples from a text file
  finalize [method]    Finish counting (${RESIDUAL_METHODS.join(', ')})
  status               Session status
  matrix               Non-zero rainflow matrix entries
  residue              Unclosed turning points
  rp                   Range pair histogram
  lc                   Level crossing histogram
  damage               Cumulative damage
  symmetric            Fold the matrix onto its upper triangle
  new                  Start a new session
  config               Show the counting configuration
  exit                 Quit
`);
  }

  /**
   * Run an operation, print session errors instead of throwing
   */
  private run(action: () => void): boolean {
    try {
      action();
      return true;
    } catch (error) {
      if (isRainflowError(error)) {
        console.log(`${COLORS.red}✗ [${error.code}] ${error.message}${COLORS.reset}`);
        console.log(`${COLORS.dim}  Use 'new' to start over${COLORS.reset}`);
        return false;
      }
      if (error instanceof SessionNotFoundError) {
        console.log(`${COLORS.red}✗ ${error.message}${COLORS.reset}`);
        return false;
      }
      throw error;
    }
  }
}
