// Tests for the video browser state machine

import { describe, expect, test } from 'vitest';
import {
  VideoBrowser,
  viewportSizeForHeight,
  type BrowserEvent,
} from '../src/browser.ts';
import { key, videoList } from './helpers.ts';

function typeFilter(browser: VideoBrowser, text: string): void {
  browser.dispatch({ type: 'enterFilterMode' });
  for (const char of text) {
    browser.dispatch({ type: 'edit', key: key(char) });
  }
}

function expectInvariants(browser: VideoBrowser): void {
  const count = browser.items.length;
  if (count === 0) {
    expect(browser.cursor).toBe(0);
    expect(browser.viewportTop).toBe(0);
    return;
  }
  expect(browser.cursor).toBeGreaterThanOrEqual(0);
  expect(browser.cursor).toBeLessThan(count);
  expect(browser.viewportTop).toBeLessThanOrEqual(browser.cursor);
  expect(browser.cursor).toBeLessThan(browser.viewportTop + browser.viewportSize);
}

// ===========================================================================
// Construction and sizing
// ===========================================================================

test('starts in navigation at the top with every candidate', () => {
  const videos = videoList(3);
  const browser = new VideoBrowser(videos);
  expect(browser.mode).toBe('navigation');
  expect(browser.status).toBe('running');
  expect(browser.items).toEqual(videos);
  expect(browser.cursor).toBe(0);
  expect(browser.viewportTop).toBe(0);
  expect(browser.viewportSize).toBe(20);
  expect(browser.filterText).toBe('');
});

test('refuses an empty candidate list', () => {
  expect(() => new VideoBrowser([])).toThrow('VideoBrowser needs at least one candidate');
});

test('viewport size follows terminal height with a minimum of 5', () => {
  expect(viewportSizeForHeight(30)).toBe(25);
  expect(viewportSizeForHeight(10)).toBe(5);
  expect(viewportSizeForHeight(3)).toBe(5);

  const browser = new VideoBrowser(videoList(3));
  browser.dispatch({ type: 'resize', height: 24 });
  expect(browser.viewportSize).toBe(19);
});

// ===========================================================================
// Navigation
// ===========================================================================

describe('navigation', () => {
  test('moving down scrolls just enough to keep the cursor visible', () => {
    const browser = new VideoBrowser(videoList(25), { initialViewportSize: 10 });
    for (let i = 0; i < 12; i++) {
      browser.dispatch({ type: 'moveDown' });
    }
    expect(browser.cursor).toBe(12);
    expect(browser.viewportTop).toBe(3);

    for (let i = 0; i < 5; i++) {
      browser.dispatch({ type: 'moveUp' });
    }
    expect(browser.cursor).toBe(7);
    expect(browser.viewportTop).toBe(3);

    for (let i = 0; i < 5; i++) {
      browser.dispatch({ type: 'moveUp' });
    }
    expect(browser.cursor).toBe(2);
    expect(browser.viewportTop).toBe(2);
  });

  test('moves are clamped at both ends', () => {
    const browser = new VideoBrowser(videoList(3), { initialViewportSize: 10 });
    browser.dispatch({ type: 'moveUp' });
    expect(browser.cursor).toBe(0);
    for (let i = 0; i < 5; i++) {
      browser.dispatch({ type: 'moveDown' });
    }
    expect(browser.cursor).toBe(2);
    expect(browser.viewportTop).toBe(0);
  });

  test('jump to bottom shows the last page', () => {
    const browser = new VideoBrowser(videoList(25), { initialViewportSize: 10 });
    browser.dispatch({ type: 'jumpBottom' });
    expect(browser.cursor).toBe(24);
    expect(browser.viewportTop).toBe(15);

    browser.dispatch({ type: 'jumpTop' });
    expect(browser.cursor).toBe(0);
    expect(browser.viewportTop).toBe(0);
  });

  test('page down and page up move by the viewport size', () => {
    const browser = new VideoBrowser(videoList(25), { initialViewportSize: 10 });
    browser.dispatch({ type: 'pageDown' });
    expect(browser.cursor).toBe(10);
    expect(browser.viewportTop).toBe(1);

    browser.dispatch({ type: 'pageDown' });
    browser.dispatch({ type: 'pageDown' });
    expect(browser.cursor).toBe(24);
    expect(browser.viewportTop).toBe(15);

    browser.dispatch({ type: 'pageUp' });
    expect(browser.cursor).toBe(14);
    expect(browser.viewportTop).toBe(14);

    browser.dispatch({ type: 'pageUp' });
    browser.dispatch({ type: 'pageUp' });
    expect(browser.cursor).toBe(0);
    expect(browser.viewportTop).toBe(0);
  });

  test('cursor and viewport invariants hold over a long key sequence', () => {
    const browser = new VideoBrowser(videoList(37), { initialViewportSize: 7 });
    const moves: BrowserEvent[] = [
      { type: 'moveDown' },
      { type: 'pageDown' },
      { type: 'moveUp' },
      { type: 'pageDown' },
      { type: 'pageDown' },
      { type: 'moveDown' },
      { type: 'pageUp' },
      { type: 'jumpBottom' },
      { type: 'moveUp' },
      { type: 'pageUp' },
      { type: 'moveDown' },
      { type: 'jumpTop' },
    ];
    for (let round = 0; round < 3; round++) {
      for (const event of moves) {
        browser.dispatch(event);
        expectInvariants(browser);
      }
    }
  });

  test('moving up after the viewport shrank brings the cursor back into view', () => {
    const browser = new VideoBrowser(videoList(25));
    for (let i = 0; i < 19; i++) {
      browser.dispatch({ type: 'moveDown' });
    }
    expect(browser.cursor).toBe(19);
    expect(browser.viewportTop).toBe(0);

    browser.dispatch({ type: 'resize', height: 10 });
    expect(browser.viewportSize).toBe(5);

    browser.dispatch({ type: 'moveUp' });
    expect(browser.cursor).toBe(18);
    expect(browser.viewportTop).toBe(14);
    expectInvariants(browser);
  });

  test('confirm selects the item under the cursor', () => {
    const videos = videoList(5);
    const browser = new VideoBrowser(videos);
    browser.dispatch({ type: 'moveDown' });
    browser.dispatch({ type: 'moveDown' });
    browser.dispatch({ type: 'confirm' });
    expect(browser.status).toBe('selected');
    expect(browser.isFinished).toBe(true);
    expect(browser.selection).toBe(videos[2]);
  });

  test('quit finishes without a selection and later events are ignored', () => {
    const browser = new VideoBrowser(videoList(5));
    browser.dispatch({ type: 'quit' });
    expect(browser.status).toBe('quit');
    expect(browser.selection).toBeNull();

    browser.dispatch({ type: 'moveDown' });
    browser.dispatch({ type: 'confirm' });
    expect(browser.cursor).toBe(0);
    expect(browser.status).toBe('quit');
    expect(browser.selection).toBeNull();
  });
});

// ===========================================================================
// Filter editing
// ===========================================================================

describe('filter editing', () => {
  test('the list only changes on commit', () => {
    const videos = videoList(25);
    const browser = new VideoBrowser(videos);
    typeFilter(browser, '12');
    expect(browser.mode).toBe('filterEditing');
    expect(browser.filterText).toBe('12');
    expect(browser.items).toEqual(videos);

    browser.dispatch({ type: 'commit' });
    expect(browser.mode).toBe('navigation');
    expect(browser.items).toEqual(['/v/video-12.mp4']);
  });

  test('commit resets the cursor and viewport', () => {
    const browser = new VideoBrowser(videoList(25), { initialViewportSize: 10 });
    browser.dispatch({ type: 'jumpBottom' });
    typeFilter(browser, 'video-1');
    browser.dispatch({ type: 'commit' });
    expect(browser.items).toHaveLength(10);
    expect(browser.cursor).toBe(0);
    expect(browser.viewportTop).toBe(0);
  });

  test('navigation keys are not applied while editing', () => {
    const browser = new VideoBrowser(videoList(25));
    browser.dispatch({ type: 'enterFilterMode' });
    browser.dispatch({ type: 'moveDown' });
    browser.dispatch({ type: 'confirm' });
    browser.dispatch({ type: 'quit' });
    expect(browser.cursor).toBe(0);
    expect(browser.status).toBe('running');
    expect(browser.mode).toBe('filterEditing');
  });

  test('filtering matches the full path case-insensitively', () => {
    const browser = new VideoBrowser(['/v/Matrix/a.mkv', '/v/other/b.mkv', '/v/c.MATRIX.mp4']);
    typeFilter(browser, 'matrix');
    browser.dispatch({ type: 'commit' });
    expect(browser.items).toEqual(['/v/Matrix/a.mkv', '/v/c.MATRIX.mp4']);
  });

  test('committing an empty filter restores every candidate', () => {
    const videos = videoList(25);
    const browser = new VideoBrowser(videos);
    typeFilter(browser, 'video-2');
    browser.dispatch({ type: 'commit' });
    browser.dispatch({ type: 'moveDown' });
    browser.dispatch({ type: 'moveDown' });
    expect(browser.cursor).toBe(2);

    browser.dispatch({ type: 'enterFilterMode' });
    browser.dispatch({ type: 'edit', key: key('u', { ctrlKey: true }) });
    browser.dispatch({ type: 'commit' });
    expect(browser.filterText).toBe('');
    expect(browser.items).toEqual(videos);
    expect(browser.cursor).toBe(0);
    expect(browser.viewportTop).toBe(0);
  });

  test('the committed text stays in the buffer and recommitting changes nothing', () => {
    const browser = new VideoBrowser(videoList(25));
    typeFilter(browser, 'video-2');
    browser.dispatch({ type: 'commit' });
    const first = browser.items;

    browser.dispatch({ type: 'enterFilterMode' });
    expect(browser.filterText).toBe('video-2');
    browser.dispatch({ type: 'commit' });
    expect(browser.items).toEqual(first);
    expect(browser.items).toEqual([
      '/v/video-20.mp4',
      '/v/video-21.mp4',
      '/v/video-22.mp4',
      '/v/video-23.mp4',
      '/v/video-24.mp4',
    ]);
  });

  test('cancel discards the buffer and keeps the current list', () => {
    const browser = new VideoBrowser(videoList(25));
    typeFilter(browser, '12');
    browser.dispatch({ type: 'commit' });

    typeFilter(browser, 'zzz');
    browser.dispatch({ type: 'cancel' });
    expect(browser.mode).toBe('navigation');
    expect(browser.filterText).toBe('');
    expect(browser.items).toEqual(['/v/video-12.mp4']);
  });

  test('an empty result makes moves and confirm no-ops', () => {
    const browser = new VideoBrowser(videoList(5));
    typeFilter(browser, 'nothing-matches');
    browser.dispatch({ type: 'commit' });
    expect(browser.items).toEqual([]);

    const events: BrowserEvent[] = [
      { type: 'moveDown' },
      { type: 'moveUp' },
      { type: 'pageDown' },
      { type: 'pageUp' },
      { type: 'jumpBottom' },
      { type: 'jumpTop' },
      { type: 'confirm' },
    ];
    for (const event of events) {
      browser.dispatch(event);
      expectInvariants(browser);
    }
    expect(browser.status).toBe('running');
    expect(browser.selection).toBeNull();
  });

  test('snapshot reflects the edit buffer', () => {
    const browser = new VideoBrowser(videoList(3));
    typeFilter(browser, 'ab');
    browser.dispatch({ type: 'edit', key: key('ArrowLeft') });
    const snapshot = browser.snapshot();
    expect(snapshot).toMatchObject({
      mode: 'filterEditing',
      filterText: 'ab',
      filterCursor: 1,
      filterPlaceholder: 'filter...',
      totalCandidates: 3,
    });
  });
});
