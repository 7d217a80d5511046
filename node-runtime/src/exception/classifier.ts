import { AutomationCapabilityError, TargetNotFoundError } from '../types/errors.js';
import type { ErrorType } from '../types/step-result.js';

export function classifyError(error: unknown): ErrorType {
  if (error instanceof TargetNotFoundError) {
    return 'TargetNotFound';
  }
  if (error instanceof AutomationCapabilityError) {
    return 'AutomationCapabilityError';
  }

  // Third-party drivers report lookup misses as plain errors
  if (isTargetNotFound(extractMessage(error).toLowerCase())) {
    return 'TargetNotFound';
  }

  return 'AutomationCapabilityError';
}

export function extractMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

function isTargetNotFound(text: string): boolean {
  const patterns = [
    'image not found',
    'imagenotfound',
    'target not found',
    'could not locate',
    'unable to locate',
    'no match found',
  ];
  return patterns.some((p) => text.includes(p));
}
