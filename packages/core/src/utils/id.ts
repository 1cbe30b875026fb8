// packages/core/src/utils/id.ts

import { nanoid } from 'nanoid';

/** Generate a workflow run ID with "wf_" prefix. */
export function generateWorkflowId(): string {
  return `wf_${nanoid(16)}`;
}

