/**
 * Rainflow Engine - Residue Finalizer
 * ===================================
 * End-of-stream policies disposing of the unclosed turning points
 */

import { ResidualMethod, ValueTuple, FULL_CYCLE, HALF_CYCLE } from '../types';
import { CountingEngine } from './engine';
import { isEnclosed } from './counting/four-point';

// ============================================================================
// DISPATCH
// ============================================================================

export function finalizeResidue(engine: CountingEngine, method: ResidualMethod): void {
  switch (method) {
    case 'none':
    case 'ignore':
      engine.feedFinalize();
      break;
    case 'no_finalize':
      engine.markFinalized();
      break;
    case 'discard':
      engine.feedFinalize();
      engine.residue.clear();
      break;
    case 'half_cycles':
      finalizeWeighted(engine, HALF_CYCLE);
      break;
    case 'full_cycles':
      finalizeWeighted(engine, FULL_CYCLE);
      break;
    case 'clormann_seeger':
      finalizeClormannSeeger(engine);
      break;
    case 'repeated':
      finalizeRepeated(engine);
      break;
    case 'rp_din45667':
      finalizeDin45667(engine);
      break;
  }
}

// ============================================================================
// POLICIES
// ============================================================================

/**
 * Count every adjacent residue pair with the given weight
 */
function finalizeWeighted(engine: CountingEngine, weight: number): void {
  engine.feedFinalize();

  const points = engine.residue.view();
  for (let i = 0; i + 1 < points.length; i++) {
    engine.recorder.countCycle(points[i], points[i + 1], weight);
  }

  engine.residue.clear();
}

/**
 * Correction for the 4-point method towards HCM results: quads whose inner
 * points straddle zero and are enclosed in magnitude close as full cycles.
 */
function finalizeClormannSeeger(engine: CountingEngine): void {
  engine.feedFinalize();

  if (engine.config.countingMethod === '4ptm') {
    const residue = engine.residue;
    let i = 0;

    while (i + 4 <= residue.length) {
      const b = residue.at(i + 1);
      const c = residue.at(i + 2);
      const d = residue.at(i + 3);

      if (b.value * c.value < 0 && Math.abs(d.value) >= Math.abs(b.value) && Math.abs(b.value) >= Math.abs(c.value)) {
        engine.recorder.countCycle(b, c, FULL_CYCLE);
        residue.remove(i + 1, 2);
      } else {
        i++;
      }
    }
  }

  engine.residue.clear();
}

/**
 * Feed the residue once more, as if the load history was repeated
 */
function finalizeRepeated(engine: CountingEngine): void {
  if (!engine.isFinalized() && engine.residue.length > 0) {
    const pendingInterim = engine.filter.getInterim();
    const copy: ValueTuple[] = engine.residue.toArray();
    if (pendingInterim) {
      copy.push({ ...pendingInterim });
    }

    // The last cycle of the copy may only be open because its end was the
    // interim point; it must not be counted twice
    if (copy.length >= 4) {
      const idx = copy.length - 4;
      if (isEnclosed(copy[idx].cls, copy[idx + 1].cls, copy[idx + 2].cls, copy[idx + 3].cls)) {
        copy.splice(idx + 1, 2);
      }
    }

    engine.refeed(copy.slice(0, -1));

    // The interim point may have been confirmed and stored meanwhile
    const last = copy[copy.length - 1];
    if (pendingInterim && pendingInterim.tpPos && !last.tpPos && last.pos === pendingInterim.pos) {
      last.tpPos = pendingInterim.tpPos;
    }
    engine.refeed([last]);
  }

  // Counts the level crossing of the last slope
  engine.feedFinalize();
  engine.residue.clear();
}

interface ResidueSlope {
  slope: number;
  lhs: ValueTuple;
  rhs: ValueTuple;
}

/**
 * Range pair counting of the residue according to DIN 45667: rising and
 * falling slopes are ranked by size and paired, the smaller slope of each
 * pair is counted.
 */
function finalizeDin45667(engine: CountingEngine): void {
  engine.feedFinalize();

  const points = engine.residue.view();
  if (points.length > 2) {
    const slopes: ResidueSlope[] = [];
    for (let i = 0; i + 1 < points.length; i++) {
      slopes.push({ slope: points[i + 1].cls - points[i].cls, lhs: points[i], rhs: points[i + 1] });
    }

    // Rising slopes first, each group by descending magnitude (stable)
    const ranked = slopes
      .map((s, index) => ({ s, index }))
      .sort((a, b) => {
        const groupA = a.s.slope > 0 ? 0 : 1;
        const groupB = b.s.slope > 0 ? 0 : 1;
        if (groupA !== groupB) return groupA - groupB;
        const diff = Math.abs(b.s.slope) - Math.abs(a.s.slope);
        return diff !== 0 ? diff : a.index - b.index;
      })
      .map((entry) => entry.s);

    const k = ranked.filter((s) => s.slope > 0).length;

    for (let i = 0; i < k && i + k < ranked.length; i++) {
      const rising = ranked[i];
      const falling = ranked[i + k];
      let chosen: ResidueSlope;

      if (Math.abs(rising.slope) === Math.abs(falling.slope)) {
        chosen = rising.rhs.pos < falling.rhs.pos ? rising : falling;
      } else {
        chosen = Math.abs(rising.slope) < Math.abs(falling.slope) ? rising : falling;
      }

      engine.recorder.countCycle(chosen.lhs, chosen.rhs, FULL_CYCLE);
    }
  }

  engine.residue.clear();
}
