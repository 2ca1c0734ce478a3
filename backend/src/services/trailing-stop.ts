import type { TrailingStopSettings } from '../util/agent-config.js';
import type {
  DetectorRecord,
  Ema50Position,
} from '../repos/detector-state.types.js';
import type {
  TrailingStopDetection,
  TrailingStopInput,
  TrailingStopResult,
} from './detectors.types.js';

export function emptyDetectorRecord(): DetectorRecord {
  return { dynamicAth: null, ema50Position: null };
}

/**
 * Single read-check-write transition for one asset and one cycle. Returns the
 * detections together with the record the caller must store in place of
 * `previous`; the input record is never mutated.
 *
 * The ATH-drop and EMA50-cross checks are independent, so both may be
 * reported in the same cycle.
 */
export function evaluateTrailingStop(
  input: TrailingStopInput,
  previous: DetectorRecord | undefined,
  settings: TrailingStopSettings | undefined,
): TrailingStopResult {
  const prev = previous ?? emptyDetectorRecord();
  const state: DetectorRecord = { ...prev };
  const detections: TrailingStopDetection[] = [];
  const { price, ema50 } = input;

  if (price === null || !settings) {
    return { detections, state };
  }

  const threshold = settings.percentDropFromAth;
  if (threshold !== null && threshold !== undefined) {
    const high = prev.dynamicAth;
    if (high === null || price > high) {
      // first observation or a new high: move the mark, never alert
      state.dynamicAth = price;
    } else if (high > 0) {
      const dropPct = ((high - price) / high) * 100;
      if (dropPct >= threshold) {
        detections.push({ kind: 'ATH_DROP', dropPct, dynamicAth: high, threshold });
      }
    }
  }

  if (settings.closeBelowEma50 && ema50 !== null) {
    const position: Ema50Position = price >= ema50 ? 'above' : 'below';
    if (prev.ema50Position === 'above' && position === 'below') {
      detections.push({ kind: 'CLOSE_BELOW_EMA50', ema50 });
    }
    state.ema50Position = position;
  }

  return { detections, state };
}
