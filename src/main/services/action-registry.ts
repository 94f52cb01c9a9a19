import { createStore, type StoreApi } from 'zustand/vanilla';
import type { ActionCallback, PluginAction } from '../../shared/plugin-types';
import { DEFAULT_MENU_TITLE } from '../../shared/plugin-types';
import { ValidationError } from '../../shared/errors';

export interface ActionInput {
  text: string;
  callback: ActionCallback;
  tooltip?: string;
  menuTitle?: string;
  source?: string | null;
}

export interface ActionRegistryState {
  /** Menu titles in the order they first received an action. */
  menuTitles: string[];
  /** menu title → actions in registration order */
  actionsByMenu: Record<string, PluginAction[]>;
  /** Ids are never reused, even across clear(). */
  nextId: number;

  appendAction: (input: ActionInput) => PluginAction;
  listActions: (menuTitle: string) => PluginAction[];
  getMenuTitles: () => string[];
  getAllActions: () => PluginAction[];
  clear: () => void;
}

export type ActionRegistry = StoreApi<ActionRegistryState>;

export function createActionRegistry(): ActionRegistry {
  return createStore<ActionRegistryState>((set, get) => ({
    menuTitles: [],
    actionsByMenu: {},
    nextId: 1,

    appendAction: (input) => {
      const errors: string[] = [];
      if (typeof input.text !== 'string' || !input.text) {
        errors.push('Action text must be a non-empty string');
      }
      if (typeof input.callback !== 'function') {
        errors.push('Action callback must be a function');
      }
      const menuTitle = input.menuTitle ?? DEFAULT_MENU_TITLE;
      if (typeof menuTitle !== 'string' || !menuTitle) {
        errors.push('Menu title must be a non-empty string');
      }
      if (errors.length > 0) {
        throw new ValidationError(errors);
      }

      const action: PluginAction = Object.freeze({
        id: get().nextId,
        text: input.text,
        callback: input.callback,
        tooltip: input.tooltip ?? '',
        menuTitle,
        source: input.source ?? null,
      });

      set((s) => {
        const existing = Object.prototype.hasOwnProperty.call(s.actionsByMenu, menuTitle)
          ? s.actionsByMenu[menuTitle]
          : undefined;
        return {
          nextId: s.nextId + 1,
          menuTitles: existing ? s.menuTitles : [...s.menuTitles, menuTitle],
          actionsByMenu: { ...s.actionsByMenu, [menuTitle]: [...(existing ?? []), action] },
        };
      });
      return action;
    },

    listActions: (menuTitle) => {
      const { actionsByMenu } = get();
      return Object.prototype.hasOwnProperty.call(actionsByMenu, menuTitle) ? [...actionsByMenu[menuTitle]] : [];
    },

    getMenuTitles: () => [...get().menuTitles],

    getAllActions: () => {
      const { menuTitles, actionsByMenu } = get();
      return menuTitles
        .flatMap((title) => actionsByMenu[title])
        .sort((a, b) => a.id - b.id);
    },

    clear: () => set({ menuTitles: [], actionsByMenu: {} }),
  }));
}
