import { Injectable } from '@nestjs/common';
import { ConversationKind, ConversationState, StateOf } from './conversation-state';

/** One conversation per user, replaced wholesale on every transition. */
@Injectable()
export class StateService {
  private userStates = new Map<number, ConversationState>();

  getUserState(telegramId: number): ConversationState | undefined {
    return this.userStates.get(telegramId);
  }

  /** The current state when it is of the given kind. */
  getState<K extends ConversationKind>(telegramId: number, kind: K): StateOf<K> | undefined {
    const state = this.userStates.get(telegramId);
    return state && isKind(state, kind) ? state : undefined;
  }

  setUserState(telegramId: number, state: ConversationState): void {
    this.userStates.set(telegramId, state);
  }

  clearState(telegramId: number): boolean {
    return this.userStates.delete(telegramId);
  }

  getStateCount(): number {
    return this.userStates.size;
  }
}

function isKind<K extends ConversationKind>(state: ConversationState, kind: K): state is StateOf<K> {
  return state.kind === kind;
}
