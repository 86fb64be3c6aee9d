import { ListingState, MarketItem } from '../types';

export type ListingAction = 'BUY' | 'RELIST';

export class ListingStateMachine {
  private static readonly transitions: Record<ListingState, Partial<Record<ListingAction, ListingState>>> = {
    [ListingState.LISTED]: { BUY: ListingState.HELD },
    [ListingState.HELD]: { RELIST: ListingState.LISTED }
  };

  static stateOf(item: MarketItem): ListingState {
    return item.seller === null ? ListingState.HELD : ListingState.LISTED;
  }

  static isValidTransition(currentState: ListingState, action: ListingAction): boolean {
    return this.transitions[currentState][action] !== undefined;
  }

  static getNextState(currentState: ListingState, action: ListingAction): ListingState {
    const next = this.transitions[currentState][action];
    if (next === undefined) {
      throw new Error(`Invalid transition from ${currentState} via ${action}`);
    }
    return next;
  }

  static validateTransition(item: MarketItem, action: ListingAction): { valid: boolean; error?: string } {
    const state = this.stateOf(item);

    if (!this.isValidTransition(state, action)) {
      switch (action) {
        case 'BUY':
          return { valid: false, error: `Token ${item.tokenId} is not listed for sale` };
        case 'RELIST':
          return { valid: false, error: `Token ${item.tokenId} is already listed` };
      }
    }

    return { valid: true };
  }
}
