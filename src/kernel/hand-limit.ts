import type { InstanceId, PlayerId } from './branded.js';
import { expectIndex } from './decisions.js';
import { appendEvent } from './event-log.js';
import { stateInvariantError } from './runtime-error.js';
import { requestChoice } from './step-context.js';
import type { StepContext } from './step-context.js';
import type { CardInstance, ChoiceOption } from './types.js';
import { HAND_LIMIT, playerOf, resetInstance } from './zones.js';

/**
 * Puts a card into a hand and enforces the hand limit at once. The owner
 * discards to trash; a protected instance is never offered for discard.
 */
export const addToHand = (ctx: StepContext, player: PlayerId, card: CardInstance, protectedCard?: InstanceId): void => {
  const { work } = ctx;
  const hand = playerOf(work, player).hand;
  hand.push(resetInstance(card));

  while (hand.length > HAND_LIMIT) {
    const options: ChoiceOption[] = [];
    hand.forEach((held, index) => {
      if (held.id !== protectedCard) {
        options.push({ type: 'index', index });
      }
    });

    const index = expectIndex(
      requestChoice(ctx, {
        kind: 'discard',
        player,
        source: null,
        prompt: `Hand limit is ${HAND_LIMIT}: choose a card to discard`,
        options,
      }),
    );
    const [discarded] = hand.splice(index, 1);
    if (discarded === undefined) {
      throw stateInvariantError(`discard index ${index} out of range`);
    }
    work.trash.push(discarded);
    appendEvent(work, 'discard', player, `${discarded.name} discarded`, { card: discarded.name });
  }
};
