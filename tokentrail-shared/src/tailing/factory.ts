/**
 * Creates the cursor matching an adapter's source kind.
 */

import type { PlatformAdapter } from '../providers/types';
import { JsonlTailCursor } from './JsonlTailCursor';
import { DocumentCursor } from './DocumentCursor';
import type { SourceCursor } from './types';

export function createCursor(adapter: PlatformAdapter, filePath: string): SourceCursor {
  switch (adapter.sourceKind) {
    case 'jsonl':
      return new JsonlTailCursor(filePath);
    case 'document':
      return new DocumentCursor(filePath, adapter);
  }
}
