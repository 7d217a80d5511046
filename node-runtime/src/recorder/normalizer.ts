import type { KeyboardStep, LeafStep } from '../types/index.js';
import { createKeyboardStep } from '../model/steps.js';

function isTypedCharacter(step: LeafStep): step is KeyboardStep {
  return step.type === 'keyboard' && step.action === 'Type Text' && step.value.length === 1;
}

/**
 * Merge runs of single-character `Type Text` steps into one step each.
 * A merged step keeps the delay of its first character.
 */
export function coalesceRecordedSteps(steps: readonly LeafStep[]): LeafStep[] {
  const merged: LeafStep[] = [];
  let text = '';
  let textDelay = 0;

  const flush = () => {
    if (text === '') return;
    merged.push(createKeyboardStep({ action: 'Type Text', value: text, delay: textDelay }));
    text = '';
  };

  for (const step of steps) {
    if (isTypedCharacter(step)) {
      if (text === '') textDelay = step.delay;
      text += step.value;
    } else {
      flush();
      merged.push(step);
    }
  }
  flush();

  return merged;
}
