import { resolveCenterCard } from './effects-center.js';
import { kernelRuntimeError } from './runtime-error.js';
import type { StepContext } from './step-context.js';
import { centerOf, definitionOf, playerOf } from './zones.js';

/** Seeds the occupancy tracker so an untouched center never re-fires. */
export const beginCenterTracking = (ctx: StepContext): void => {
  ctx.creditedCenter = centerOf(playerOf(ctx.work, ctx.work.activePlayer).row)?.id ?? null;
  ctx.centerTriggers = 0;
};

/**
 * Re-evaluates the active row's center after a mutation until it is stable.
 * Each new occupancy of the middle slot is credited once; a face-up center
 * card then resolves. Rows shorter than three clear the occupancy.
 */
export const settleCenter = (ctx: StepContext): void => {
  const owner = ctx.work.activePlayer;

  while (true) {
    const center = centerOf(playerOf(ctx.work, owner).row);
    if (center === null) {
      ctx.creditedCenter = null;
      return;
    }
    if (center.id === ctx.creditedCenter) {
      return;
    }

    ctx.creditedCenter = center.id;
    if (center.faceDown || definitionOf(ctx.def, center).category !== 'center') {
      continue;
    }

    ctx.centerTriggers += 1;
    const limit = ctx.def.config.maxCenterTriggersPerTurn;
    if (ctx.centerTriggers > limit) {
      throw kernelRuntimeError(
        'CENTER_TRIGGER_LIMIT_EXCEEDED',
        `center triggers exceeded ${limit} in one turn`,
        { limit, turn: ctx.work.turn },
      );
    }
    resolveCenterCard(ctx, owner, center);
  }
};
