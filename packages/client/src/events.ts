/**
 * Everything the host loop receives from `pollEvents()`
 */

import type { AuthEvent } from '@hostloop/auth';
import type { DocumentEvent } from '@hostloop/documents';

export type BridgeEvent = AuthEvent | DocumentEvent;
