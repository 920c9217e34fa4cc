/**
 * Human-readable model names. Unknown ids are shown as-is.
 */

import modelNames from '../data/models.json';

const DISPLAY_NAMES: Readonly<Record<string, string>> = modelNames;

export function modelDisplayName(model: string): string {
  if (!model) return '';
  return Object.hasOwn(DISPLAY_NAMES, model) ? DISPLAY_NAMES[model] : model;
}
