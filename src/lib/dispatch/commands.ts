/**
 * Command events (options menu selections and similar identifier-keyed commands).
 *
 * WHY: A selected command's stable name maps to a handler by the `<name>Clicked` convention.
 * The router resolves that mapping once per screen instead of on every selection.
 * INVARIANT: The one-argument form (receiving the MenuItem) is preferred over the zero-argument form.
 * INVARIANT: Unknown ids and missing handlers are reported as "not handled", never thrown.
 */

import { ScreenError, ScreenErrorCode } from '../errors';
import { ARG_TYPE } from './argTypes';
import { EventDispatcher } from './dispatcher';

export type MenuItemInit = {
  itemId: number;
  title?: string;
  checked?: boolean;
};

export class MenuItem {
  readonly [ARG_TYPE] = 'MenuItem';
  readonly itemId: number;
  readonly title: string;
  readonly checked: boolean;

  constructor(init: MenuItemInit) {
    this.itemId = init.itemId;
    this.title = init.title ?? '';
    this.checked = init.checked ?? false;
  }
}

// Maps numeric item ids to stable command names and back.
export class IdRegistry {
  private readonly namesById = new Map<number, string>();
  private readonly idsByName = new Map<string, number>();

  constructor(entries?: Iterable<readonly [string, number]>) {
    if (entries) {
      for (const [name, id] of entries) this.register(name, id);
    }
  }

  register(name: string, id: number): void {
    const existingId = this.idsByName.get(name);
    const existingName = this.namesById.get(id);
    if (existingId === id && existingName === name) return;
    if (existingId !== undefined) {
      throw new ScreenError(ScreenErrorCode.InvalidDeclaration, `Command name ${name} is already bound to id ${existingId}`);
    }
    if (existingName !== undefined) {
      throw new ScreenError(ScreenErrorCode.InvalidDeclaration, `Command id ${id} is already bound to ${existingName}`);
    }
    this.namesById.set(id, name);
    this.idsByName.set(name, id);
  }

  nameFor(id: number): string | null {
    return this.namesById.get(id) ?? null;
  }

  idFor(name: string): number | null {
    return this.idsByName.get(name) ?? null;
  }

  names(): string[] {
    return Array.from(this.idsByName.keys());
  }
}

export const commandHandlerName = (name: string): string => `${name}Clicked`;

export type CommandArity = 0 | 1;

export type CommandRoute = {
  readonly command: string;
  readonly handlerName: string;
  readonly arity: CommandArity;
  readonly dispatcher: EventDispatcher;
};

const PROBE_ITEM = new MenuItem({ itemId: -1 });

export const resolveCommandRoute = (receiver: object, command: string): CommandRoute | null => {
  const handlerName = commandHandlerName(command);
  const dispatcher = new EventDispatcher(handlerName);
  if (dispatcher.supportedBy(receiver, PROBE_ITEM)) {
    return { command, handlerName, arity: 1, dispatcher };
  }
  if (dispatcher.supportedBy(receiver)) {
    return { command, handlerName, arity: 0, dispatcher };
  }
  return null;
};

export class CommandRouter {
  private readonly routes = new Map<string, CommandRoute | null>();
  private readonly receiver: object;
  private readonly ids: IdRegistry;

  constructor(receiver: object, ids: IdRegistry) {
    this.receiver = receiver;
    this.ids = ids;
    for (const name of ids.names()) {
      this.routes.set(name, resolveCommandRoute(receiver, name));
    }
  }

  routeFor(command: string): CommandRoute | null {
    if (!this.routes.has(command)) {
      this.routes.set(command, resolveCommandRoute(this.receiver, command));
    }
    return this.routes.get(command) ?? null;
  }

  route(item: MenuItem): boolean {
    const command = this.ids.nameFor(item.itemId);
    if (command === null) return false;
    const route = this.routeFor(command);
    if (!route) return false;
    return route.arity === 1
      ? route.dispatcher.callMethodOn(this.receiver, item)
      : route.dispatcher.callMethodOn(this.receiver);
  }
}
