// ============================================================================
// @routeconf/router: Action descriptor parsing
// ============================================================================
//
//   PageController.showPage                 → { target: 'PageController', methodName: 'showPage' }
//   PageController.showPage(id:'home')      → ... staticArgs: { id: 'home' }
//   admin.Users.show(tab:"a", mode:'b\'c')  → { target: 'admin.Users', ... }
//
// ============================================================================

import { RouteActionError } from './errors.js';
import type { ActionDescriptor } from './types.js';

/** A dotted `Controller.method` reference at the start of the action text. */
export const ACTION_REF_RE = /^[A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)+/;

/** A static argument name, matched at a fixed position. */
const ARG_NAME_RE = /[A-Za-z_][A-Za-z0-9_]*/y;

const WHITESPACE_RE = /\s/;

/**
 * Parses the ACTION column of a route line.
 *
 * @throws RouteActionError when the reference or the argument list is malformed
 */
export function parseAction(text: string): ActionDescriptor {
  const source = text.trim();
  const ref = ACTION_REF_RE.exec(source);
  if (!ref) {
    throw new RouteActionError("Expected 'Controller.method'", source);
  }

  const reference = ref[0];
  const dot = reference.lastIndexOf('.');
  const rest = source.slice(reference.length).trimStart();

  return Object.freeze({
    target: reference.slice(0, dot),
    methodName: reference.slice(dot + 1),
    staticArgs: Object.freeze(rest.length === 0 ? {} : parseStaticArgs(rest, source)),
  });
}

/**
 * Formats a descriptor as `Controller.method`, the key actions are registered
 * and reversed under.
 */
export function actionKey(action: Pick<ActionDescriptor, 'target' | 'methodName'>): string {
  return `${action.target}.${action.methodName}`;
}

// ---------------------------------------------------------------------------
// Argument list scanner
// ---------------------------------------------------------------------------

function parseStaticArgs(list: string, source: string): Record<string, string> {
  if (list[0] !== '(') {
    throw new RouteActionError(`Unexpected '${list}' after method reference`, source);
  }

  const entries: [string, string][] = [];
  let i = skipWhitespace(list, 1);

  if (list[i] === ')') {
    i++;
  } else {
    for (;;) {
      ARG_NAME_RE.lastIndex = i;
      const name = ARG_NAME_RE.exec(list);
      if (!name) {
        throw new RouteActionError('Expected argument name', source);
      }
      const key = name[0];
      if (entries.some(([existing]) => existing === key)) {
        throw new RouteActionError(`Duplicate argument '${key}'`, source);
      }

      i = skipWhitespace(list, i + key.length);
      if (list[i] !== ':') {
        throw new RouteActionError(`Expected ':' after argument '${key}'`, source);
      }
      i = skipWhitespace(list, i + 1);

      const quote = list[i];
      if (quote !== "'" && quote !== '"') {
        throw new RouteActionError(`Expected quoted value for argument '${key}'`, source);
      }

      let value = '';
      i++;
      while (i < list.length && list[i] !== quote) {
        if (list[i] === '\\' && i + 1 < list.length) {
          i++;
        }
        value += list[i];
        i++;
      }
      if (i >= list.length) {
        throw new RouteActionError(`Unterminated value for argument '${key}'`, source);
      }
      entries.push([key, value]);

      i = skipWhitespace(list, i + 1);
      if (list[i] === ',') {
        i = skipWhitespace(list, i + 1);
        continue;
      }
      if (list[i] === ')') {
        i++;
        break;
      }
      throw new RouteActionError("Expected ',' or ')' in argument list", source);
    }
  }

  if (list.slice(i).trim().length > 0) {
    throw new RouteActionError(`Unexpected '${list.slice(i).trim()}' after argument list`, source);
  }

  return Object.fromEntries(entries);
}

function skipWhitespace(text: string, from: number): number {
  let i = from;
  while (i < text.length && WHITESPACE_RE.test(text[i])) {
    i++;
  }
  return i;
}
