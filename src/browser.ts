// Video browser state machine
//
// Owns the candidate list, the committed filtered list, the cursor and
// viewport, and the Navigation / FilterEditing mode. Each input is one
// synchronous dispatch(); rendering reads snapshot().

import { filterPaths } from './filter.ts';
import type { KeyEvent } from './input.ts';
import { getLogger } from './logging.ts';
import { TextField } from './text-field.ts';

const logger = getLogger('Browser');

export type BrowserMode = 'navigation' | 'filterEditing';

export type BrowserStatus = 'running' | 'quit' | 'selected';

export type BrowserEvent =
  | { type: 'resize'; height: number }
  | { type: 'moveUp' }
  | { type: 'moveDown' }
  | { type: 'pageUp' }
  | { type: 'pageDown' }
  | { type: 'jumpTop' }
  | { type: 'jumpBottom' }
  | { type: 'enterFilterMode' }
  | { type: 'confirm' }
  | { type: 'quit' }
  | { type: 'edit'; key: KeyEvent }
  | { type: 'commit' }
  | { type: 'cancel' };

export type BrowserEventType = BrowserEvent['type'];

export interface BrowserSnapshot {
  readonly mode: BrowserMode;
  readonly status: BrowserStatus;
  readonly items: readonly string[];
  readonly totalCandidates: number;
  readonly cursor: number;
  readonly viewportTop: number;
  readonly viewportSize: number;
  readonly filterText: string;
  readonly filterCursor: number;
  readonly filterPlaceholder: string;
  readonly selection: string | null;
}

export interface VideoBrowserOptions {
  /** Rows shown before the first resize */
  initialViewportSize?: number;
  filterPlaceholder?: string;
  filterMaxLength?: number;
}

export const DEFAULT_VIEWPORT_SIZE = 20;
export const MIN_VIEWPORT_SIZE = 5;
/** Rows taken by the header, status and filter lines plus margin */
export const CHROME_ROWS = 5;

/**
 * Viewport rows for a terminal of the given height.
 */
export function viewportSizeForHeight(height: number): number {
  return Math.max(height - CHROME_ROWS, MIN_VIEWPORT_SIZE);
}

export class VideoBrowser {
  private readonly _candidates: readonly string[];
  private _items: readonly string[];
  private _cursor = 0;
  private _viewportTop = 0;
  private _viewportSize: number;
  private _mode: BrowserMode = 'navigation';
  private _status: BrowserStatus = 'running';
  private _selection: string | null = null;
  private readonly _filter: TextField;

  constructor(candidates: readonly string[], options: VideoBrowserOptions = {}) {
    if (candidates.length === 0) {
      throw new Error('VideoBrowser needs at least one candidate');
    }
    this._candidates = candidates;
    this._items = candidates;
    this._viewportSize = options.initialViewportSize ?? DEFAULT_VIEWPORT_SIZE;
    this._filter = new TextField({
      placeholder: options.filterPlaceholder ?? 'filter...',
      maxLength: options.filterMaxLength,
    });
  }

  get mode(): BrowserMode {
    return this._mode;
  }

  get status(): BrowserStatus {
    return this._status;
  }

  get isFinished(): boolean {
    return this._status !== 'running';
  }

  get selection(): string | null {
    return this._selection;
  }

  get candidates(): readonly string[] {
    return this._candidates;
  }

  get items(): readonly string[] {
    return this._items;
  }

  get cursor(): number {
    return this._cursor;
  }

  get viewportTop(): number {
    return this._viewportTop;
  }

  get viewportSize(): number {
    return this._viewportSize;
  }

  get filterText(): string {
    return this._filter.value;
  }

  /**
   * Apply one input event. Events that do not apply to the current mode,
   * and any event after the browser finished, are ignored.
   */
  dispatch(event: BrowserEvent): void {
    if (this.isFinished) {
      return;
    }

    if (event.type === 'resize') {
      this._viewportSize = viewportSizeForHeight(event.height);
      return;
    }

    if (this._mode === 'filterEditing') {
      this._dispatchFilterEditing(event);
    } else {
      this._dispatchNavigation(event);
    }
  }

  private _dispatchNavigation(event: BrowserEvent): void {
    switch (event.type) {
      case 'moveUp':
        this._moveTo(this._cursor - 1);
        break;
      case 'moveDown':
        this._moveTo(this._cursor + 1);
        break;
      case 'pageUp':
        if (this._items.length > 0) {
          this._cursor = Math.max(this._cursor - this._viewportSize, 0);
          this._viewportTop = this._cursor;
        }
        break;
      case 'pageDown':
        this._moveTo(this._cursor + this._viewportSize);
        break;
      case 'jumpTop':
        if (this._items.length > 0) {
          this._cursor = 0;
          this._viewportTop = 0;
        }
        break;
      case 'jumpBottom':
        if (this._items.length > 0) {
          this._cursor = this._items.length - 1;
          this._viewportTop = Math.max(this._items.length - this._viewportSize, 0);
        }
        break;
      case 'enterFilterMode':
        // The committed text stays in the buffer for further editing
        this._mode = 'filterEditing';
        break;
      case 'confirm':
        if (this._items.length > 0) {
          this._selection = this._items[this._cursor];
          this._status = 'selected';
          logger.info('Video selected', { path: this._selection });
        }
        break;
      case 'quit':
        this._status = 'quit';
        logger.debug('Browser quit without selection');
        break;
      default:
        break;
    }
  }

  private _dispatchFilterEditing(event: BrowserEvent): void {
    switch (event.type) {
      case 'edit':
        this._filter.handleKey(event.key);
        break;
      case 'commit':
        this._items = filterPaths(this._candidates, this._filter.value);
        this._cursor = 0;
        this._viewportTop = 0;
        this._mode = 'navigation';
        logger.debug('Filter committed', { filter: this._filter.value, matches: this._items.length });
        break;
      case 'cancel':
        // Discards the buffer; the filtered list stays as it was
        this._filter.clear();
        this._mode = 'navigation';
        break;
      default:
        break;
    }
  }

  /**
   * Move the cursor (clamped to the list) and scroll just enough to keep it visible.
   */
  private _moveTo(index: number): void {
    const count = this._items.length;
    if (count === 0) {
      return;
    }

    this._cursor = Math.max(0, Math.min(index, count - 1));

    if (this._cursor < this._viewportTop) {
      this._viewportTop = this._cursor;
    } else if (this._cursor >= this._viewportTop + this._viewportSize) {
      this._viewportTop = this._cursor - this._viewportSize + 1;
    }
    this._viewportTop = Math.max(0, this._viewportTop);
  }

  snapshot(): BrowserSnapshot {
    return {
      mode: this._mode,
      status: this._status,
      items: this._items,
      totalCandidates: this._candidates.length,
      cursor: this._cursor,
      viewportTop: this._viewportTop,
      viewportSize: this._viewportSize,
      filterText: this._filter.value,
      filterCursor: this._filter.cursor,
      filterPlaceholder: this._filter.placeholder,
      selection: this._selection,
    };
  }
}
