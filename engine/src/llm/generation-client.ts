/**
 * Generation client boundary
 *
 * Any text-generation backend (local model server, hosted API, scripted
 * double) plugs in here. Implementations should stop work when `signal`
 * aborts; the fix loop bounds every call with a timeout regardless.
 */

import type { ModelProfile } from '@repairgate/shared-types';

export interface GenerationClient {
  /** Returns the raw model output for `prompt` */
  generate(prompt: string, profile: ModelProfile, signal: AbortSignal): Promise<string>;
}
