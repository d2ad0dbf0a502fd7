import { RequestHandle } from '../context/contracts';
import { ConnectionId, DocumentId } from '../context/types';
import { NesEdit } from './nesEdit';

export interface InFlightRequest {
  readonly handle: RequestHandle;
  /** Identifies the request independently of the connection's handle numbering */
  readonly generation: string;
  readonly documentId: DocumentId;
}

/**
 * All mutable suggestion state. One instance lives as long as the controller
 * and is shared by every component.
 */
export interface NesState {
  pending: NesEdit[];
  active: NesEdit[];
  readonly requests: Map<ConnectionId, InFlightRequest>;
  /** Last document each connection was told about through `didFocus` */
  readonly focusNotified: Map<ConnectionId, DocumentId>;
}

export function createNesState(): NesState {
  return {
    pending: [],
    active: [],
    requests: new Map(),
    focusNotified: new Map(),
  };
}
