import { EventEmitter } from 'events';
import type { ToolType } from '../tools/types';
import type { State } from './states';

export interface StateChangeEvent {
  from: State;
  to: State;
  /** Tool that drove the move; absent for forced transitions */
  toolType?: ToolType;
  forced: boolean;
}

export class StateMachineEvents extends EventEmitter {
  emitTransition(event: StateChangeEvent): void {
    this.emit('stateChange', event);
  }

  onTransition(listener: (event: StateChangeEvent) => void): () => void {
    this.on('stateChange', listener);
    return () => {
      this.off('stateChange', listener);
    };
  }
}
