import { describe, expect, it } from 'vitest';

import { FrameStore } from '@/application/frame-sequence/frame-store.js';
import { type PlaybackFrameEvent, PlaybackController } from '@/application/frame-sequence/playback-controller.js';
import { createProjectStore } from '@/application/frame-sequence/project-store.js';
import { IndexError } from '@/shared/errors/compositor-errors.js';

import { sequentialIds } from '../../../helpers/frames.js';
import { ManualTickScheduler } from '../../../helpers/manual-tick-scheduler.js';

function setup(frameCount: number, fps = 24) {
  const frames = new FrameStore(createProjectStore(), sequentialIds());
  if (frameCount > 0) {
    frames.append(Array.from({ length: frameCount }, (_, index) => `frame-${index}.png`));
  }

  const scheduler = new ManualTickScheduler();
  const settings = { fps };
  const playback = new PlaybackController({ frames, scheduler, getFps: () => settings.fps });
  const events: PlaybackFrameEvent[] = [];
  playback.onFrame((event) => events.push(event));

  return { frames, scheduler, settings, playback, events };
}

describe('PlaybackController', () => {
  it('next and prev wrap around', () => {
    const { playback } = setup(5);

    playback.seek(4);
    playback.next();
    expect(playback.index).toBe(0);

    playback.prev();
    expect(playback.index).toBe(4);
  });

  it('ticks advance the index with the frame delay of the current rate', () => {
    const { playback, scheduler, events } = setup(3);

    playback.play();
    expect(playback.state).toBe('playing');
    expect(scheduler.delays).toEqual([42]);

    scheduler.fire();
    scheduler.fire();
    scheduler.fire();

    expect(events.map((event) => event.index)).toEqual([1, 2, 0]);
    expect(events[0]?.frame.source).toBe('frame-1.png');
    expect(scheduler.delays).toEqual([42, 42, 42, 42]);
  });

  it('a rate change applies from the next scheduled tick', () => {
    const { playback, scheduler, settings } = setup(3);

    playback.play();
    settings.fps = 60;
    scheduler.fire();

    expect(scheduler.delays).toEqual([42, 17]);
  });

  it('pause cancels the pending tick and keeps the position', () => {
    const { playback, scheduler } = setup(4);
    playback.play();
    scheduler.fire();

    playback.pause();

    expect(playback.state).toBe('stopped');
    expect(scheduler.pendingCount).toBe(0);
    expect(scheduler.fire()).toBe(false);
    expect(playback.index).toBe(1);
  });

  it('stop rewinds to the first frame', () => {
    const { playback, scheduler, events } = setup(4);
    playback.play();
    scheduler.fire();
    scheduler.fire();

    playback.stop();

    expect(playback.index).toBe(0);
    expect(events.at(-1)?.index).toBe(0);
  });

  it('toggle flips between playing and stopped', () => {
    const { playback } = setup(2);

    expect(playback.toggle()).toBe('playing');
    expect(playback.toggle()).toBe('stopped');
  });

  it('an empty sequence ignores play, next and prev', () => {
    const { playback, scheduler, events } = setup(0);

    playback.play();
    playback.next();
    playback.prev();

    expect(playback.state).toBe('stopped');
    expect(scheduler.delays).toEqual([]);
    expect(events).toEqual([]);
  });

  it('seek validates the index', () => {
    const { playback } = setup(2);

    expect(() => playback.seek(2)).toThrowError(IndexError);
    expect(playback.index).toBe(0);
  });

  it('clamps the index when frames are removed and stops when none remain', () => {
    const { playback, frames } = setup(3);
    playback.seek(2);
    playback.play();

    frames.removeAt(2);
    expect(playback.index).toBe(1);
    expect(playback.state).toBe('playing');

    frames.clear();
    expect(playback.state).toBe('stopped');
    expect(playback.index).toBe(0);
  });

  it('dispose stops playback and detaches from the frame store', () => {
    const { playback, frames, scheduler, events } = setup(2);
    playback.play();

    playback.dispose();
    frames.clear();

    expect(scheduler.fire()).toBe(false);
    expect(events).toEqual([]);
    expect(playback.state).toBe('stopped');
  });
});
