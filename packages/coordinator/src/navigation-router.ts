/**
 * Navigation Router
 *
 * Stack of presented screens. Each pop runs the screen's pop completion and
 * emits `didPopModule` with the popped screen, whichever API caused it.
 */

import { EventEmitter } from 'events';
import { ThreadlineError } from '@threadline/utils/errors';
import { createLogger } from '@threadline/utils/logger';
import type { Screen } from './screens.js';

const log = createLogger('router');

interface StackEntry {
  screen: Screen;
  onPop?: () => void;
}

export class NavigationRouter extends EventEmitter {
  static readonly didPopModule = 'didPopModule';

  private stack: StackEntry[] = [];

  get modules(): Screen[] {
    return this.stack.map((entry) => entry.screen);
  }

  get topModule(): Screen | undefined {
    return this.stack[this.stack.length - 1]?.screen;
  }

  /** Replace the whole stack with a single root screen */
  setRootModule(screen: Screen, onPop?: () => void): void {
    while (this.stack.length > 0) {
      this.popTop();
    }
    this.stack.push({ screen, onPop });
    log.debug('Root module set', { screen: screen.id });
  }

  push(screen: Screen, onPop?: () => void): void {
    this.stack.push({ screen, onPop });
    log.debug('Module pushed', { screen: screen.id, depth: this.stack.length });
  }

  /** Pop the top screen. The root screen stays. */
  popModule(): Screen | undefined {
    if (this.stack.length <= 1) {
      return undefined;
    }
    return this.popTop();
  }

  /** Pop every screen above `screen`; no-op when it is not on the stack */
  popToModule(screen: Screen): Screen[] {
    const target = this.stack.findIndex((entry) => entry.screen === screen);
    if (target === -1) {
      log.warn('popToModule target not on stack', { screen: screen.id });
      return [];
    }
    const popped: Screen[] = [];
    while (this.stack.length - 1 > target) {
      popped.push(this.popTop());
    }
    return popped;
  }

  private popTop(): Screen {
    const entry = this.stack.pop();
    if (!entry) {
      throw new ThreadlineError('Cannot pop an empty navigation stack');
    }
    entry.onPop?.();
    this.emit(NavigationRouter.didPopModule, entry.screen);
    log.debug('Module popped', { screen: entry.screen.id, depth: this.stack.length });
    return entry.screen;
  }
}
