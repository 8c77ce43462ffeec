/**
 * @fileoverview Agenda session.
 *
 * Owns the confirmed event cache for the displayed week and coordinates
 * parser → resolver → calendar store. Moves, resizes and deletes are shown
 * immediately as local edits layered over the cache; the store either
 * confirms them or the layer is dropped, which restores the last confirmed
 * state. New events only enter the cache once the store has assigned an id.
 *
 * Every store call is raced against `storeTimeoutMs`. A call that loses the
 * race is reported as StoreError (Unreachable); if the store applies it
 * later anyway, the next refresh picks that up.
 */

import {
  StoreError,
  ResolverError,
  ok,
  fail,
  type ParseError,
  type Result,
} from '../../utils/errors.js';
import { createLogger, withLogContext } from '../../utils/observability/index.js';
import { toStoreError } from '../calendar/errors.js';
import {
  parseTimeExpression,
  describeSchedule,
  resolveFromPreset,
  applyDuration,
  durationMinutes,
  resolveEvent,
  moveEvent as resolveMove,
  resizeEvent as resolveResize,
  toSchedule,
  type CalendarEvent,
  type PendingEvent,
  type ResolvedSchedule,
  type ScheduleOptions,
} from '../schedule/index.js';
import {
  createWeekWindow,
  shiftWeek,
  goToToday as windowForToday,
  containsDate,
  eventsOnDay,
  projectWeek,
  todaySchedule,
  dropSlotToStart,
  type EventView,
  type WeekProjection,
  type WeekWindow,
} from '../week/index.js';
import type {
  AddTaskInput,
  AgendaSessionOptions,
  InlineFeedback,
  NoticeLevel,
  ScheduledEvent,
  SessionError,
} from './types.js';

const log = createLogger({ domain: 'agenda-session' });

type LocalEdit =
  | { kind: 'update'; event: CalendarEvent }
  | { kind: 'delete' };

type UpdateVerb = 'move' | 'resize';

const UPDATE_NOTICES: Record<UpdateVerb, { done: string; failed: string }> = {
  move: { done: 'Event moved', failed: 'Failed to move event' },
  resize: { done: 'Event resized', failed: 'Failed to resize event' },
};

export class AgendaSession {
  private confirmed: CalendarEvent[] = [];
  private readonly edits = new Map<string, LocalEdit>();
  private readonly background = new Set<Promise<void>>();
  private currentWindow: WeekWindow;

  constructor(private readonly options: AgendaSessionOptions) {
    this.currentWindow = createWeekWindow(options.clock.now(), options.timezone);
  }

  private get scheduleOptions(): ScheduleOptions {
    return {
      timezone: this.options.timezone,
      defaultDurationMinutes: this.options.defaultDurationMinutes,
    };
  }

  private now(): Date {
    return this.options.clock.now();
  }

  get window(): WeekWindow {
    return this.currentWindow;
  }

  /** Confirmed events with in-flight edits applied. */
  events(): CalendarEvent[] {
    const visible: CalendarEvent[] = [];
    for (const event of this.confirmed) {
      const edit = this.edits.get(event.id);
      if (edit?.kind === 'delete') continue;
      visible.push(edit?.kind === 'update' ? edit.event : event);
    }
    return visible;
  }

  /** Events as last confirmed by the store, without local edits. */
  confirmedEvents(): CalendarEvent[] {
    return [...this.confirmed];
  }

  isEditing(eventId: string): boolean {
    return this.edits.has(eventId);
  }

  projection(): WeekProjection {
    return projectWeek(this.currentWindow, this.events(), this.now());
  }

  today(): EventView[] {
    return todaySchedule(this.events(), this.now(), this.options.timezone);
  }

  /** Start time for a drop on the week grid, or null outside the columns. */
  dropToStart(dayIndex: number, minutesFromGridStart: number): Date | null {
    return dropSlotToStart(this.currentWindow, dayIndex, minutesFromGridStart, this.options.grid);
  }

  // ---------------------------------------------------------------------------
  // Inline feedback
  // ---------------------------------------------------------------------------

  private feedback(schedule: ResolvedSchedule): InlineFeedback {
    return {
      ok: true,
      label: describeSchedule(schedule, this.options.timezone),
      schedule,
      durationMinutes: durationMinutes(schedule),
    };
  }

  preview(text: string): InlineFeedback {
    const parsed = parseTimeExpression(text, this.now(), this.scheduleOptions);
    if (!parsed.success) {
      return { ok: false, kind: parsed.error.kind, message: parsed.error.message };
    }
    return this.feedback(parsed.data);
  }

  /** @throws AppError (UNKNOWN_PRESET) for ids outside the preset table */
  previewPreset(presetId: string): InlineFeedback {
    return this.feedback(resolveFromPreset(presetId, this.now(), this.scheduleOptions));
  }

  // ---------------------------------------------------------------------------
  // Week navigation
  // ---------------------------------------------------------------------------

  async refresh(): Promise<Result<CalendarEvent[], StoreError>> {
    const window = this.currentWindow;
    try {
      const events = await this.bounded('listEvents', () =>
        this.options.store.listEvents({ start: window.start, end: window.end })
      );
      // A navigation that happened while loading wins.
      if (window === this.currentWindow) {
        this.confirmed = [...events];
      }
      log.debug('week_loaded', { weekOffset: window.weekOffset, count: events.length });
      return ok(events);
    } catch (error) {
      const storeError = toStoreError(error, 'listEvents');
      log.warn('week_load_failed', { weekOffset: window.weekOffset, kind: storeError.kind });
      this.notify('error', 'Failed to load calendar');
      return fail(storeError);
    }
  }

  async navigateWeek(direction: number): Promise<Result<CalendarEvent[], StoreError>> {
    this.setWindow(shiftWeek(this.currentWindow, direction));
    return this.refresh();
  }

  async goToToday(): Promise<Result<CalendarEvent[], StoreError>> {
    this.setWindow(windowForToday(this.currentWindow, this.now()));
    return this.refresh();
  }

  private setWindow(window: WeekWindow): void {
    this.currentWindow = window;
    this.confirmed = [];
  }

  // ---------------------------------------------------------------------------
  // Adding tasks
  // ---------------------------------------------------------------------------

  private scheduleFor(input: AddTaskInput): Result<ResolvedSchedule, ParseError | ResolverError> {
    const now = this.now();
    let schedule: ResolvedSchedule;

    if (input.preset !== undefined) {
      schedule = resolveFromPreset(input.preset, now, this.scheduleOptions);
    } else {
      const parsed = parseTimeExpression(input.when ?? '', now, this.scheduleOptions);
      if (!parsed.success) return parsed;
      schedule = parsed.data;
    }

    if (input.durationMinutes !== undefined) {
      return applyDuration(schedule, input.durationMinutes);
    }
    return ok(schedule);
  }

  /**
   * Parse, resolve and persist a new event. The cache only changes once the
   * store confirms; the task-list mirror runs in the background after that.
   */
  async addTask(input: AddTaskInput): Promise<Result<ScheduledEvent, SessionError>> {
    const schedule = this.scheduleFor(input);
    if (!schedule.success) {
      return schedule;
    }

    const mirror = input.mirrorToTasks ?? true;
    const sameDay = eventsOnDay(this.events(), schedule.data.start, this.options.timezone);
    const pending = resolveEvent(schedule.data, input.title, sameDay, mirror ? 'task-list' : 'calendar');
    if (!pending.success) {
      return pending;
    }

    let created: CalendarEvent;
    try {
      created = await this.bounded('createEvent', () =>
        this.options.store.createEvent(toSchedule(pending.data), pending.data.title, pending.data.source)
      );
    } catch (error) {
      const storeError = toStoreError(error, 'createEvent');
      log.warn('add_task_failed', { kind: storeError.kind, error: storeError.message });
      this.notify('error', 'Failed to add task');
      return fail(storeError);
    }

    if (containsDate(this.currentWindow, created.start)) {
      // A refresh that ran while the create was pending may already list it.
      this.confirmed = [...this.confirmed.filter((event) => event.id !== created.id), created];
    }
    log.info('task_added', { eventId: created.id, overlaps: pending.data.overlaps.length });
    this.notify('info', 'Task added successfully');

    if (mirror) {
      this.track(this.mirrorToTaskList(created));
    }

    return ok({ event: created, overlaps: pending.data.overlaps });
  }

  private async mirrorToTaskList(event: CalendarEvent): Promise<void> {
    let mirrored = false;
    try {
      mirrored = await this.options.tasks.addTask(event.title, event.start);
    } catch (error) {
      log.error('task_mirror_threw', { eventId: event.id, error });
    }
    if (!mirrored) {
      this.notify('error', 'Failed to add task (Things)');
    }
  }

  // ---------------------------------------------------------------------------
  // Editing existing events
  // ---------------------------------------------------------------------------

  private lookup(eventId: string): Result<CalendarEvent, StoreError | ResolverError> {
    if (this.edits.has(eventId)) {
      return fail(
        new ResolverError('EditInProgress', 'This event is still being saved', { eventId })
      );
    }
    const event = this.confirmed.find((candidate) => candidate.id === eventId);
    if (!event) {
      return fail(new StoreError('NotFound', `Event ${eventId} not found`, { eventId }));
    }
    return ok(event);
  }

  private sameDayAs(date: Date): CalendarEvent[] {
    return eventsOnDay(this.events(), date, this.options.timezone);
  }

  async moveEvent(
    eventId: string,
    newStart: Date
  ): Promise<Result<ScheduledEvent, StoreError | ResolverError>> {
    const found = this.lookup(eventId);
    if (!found.success) return found;

    const pending = resolveMove(found.data, newStart, this.sameDayAs(newStart));
    if (!pending.success) return pending;

    return this.commitUpdate(found.data, pending.data, 'move');
  }

  async resizeEvent(
    eventId: string,
    edges: { start?: Date; end?: Date }
  ): Promise<Result<ScheduledEvent, StoreError | ResolverError>> {
    const found = this.lookup(eventId);
    if (!found.success) return found;

    const pending = resolveResize(found.data, edges, this.sameDayAs(edges.start ?? found.data.start));
    if (!pending.success) return pending;

    return this.commitUpdate(found.data, pending.data, 'resize');
  }

  private async commitUpdate(
    original: CalendarEvent,
    pending: PendingEvent,
    verb: UpdateVerb
  ): Promise<Result<ScheduledEvent, StoreError>> {
    const eventId = original.id;
    this.edits.set(eventId, {
      kind: 'update',
      event: { ...original, start: pending.start, end: pending.end },
    });

    try {
      const updated = await this.bounded(
        'updateEvent',
        () => this.options.store.updateEvent(eventId, toSchedule(pending)),
        eventId
      );
      this.confirmed = containsDate(this.currentWindow, updated.start)
        ? this.confirmed.map((event) => (event.id === eventId ? updated : event))
        : this.confirmed.filter((event) => event.id !== eventId);
      log.info('event_updated', { eventId, verb });
      this.notify('info', UPDATE_NOTICES[verb].done);
      return ok({ event: updated, overlaps: pending.overlaps });
    } catch (error) {
      const storeError = toStoreError(error, 'updateEvent', eventId);
      log.warn('event_update_rolled_back', { eventId, verb, kind: storeError.kind });
      this.notify('error', UPDATE_NOTICES[verb].failed);
      return fail(storeError);
    } finally {
      this.edits.delete(eventId);
    }
  }

  /**
   * Delete an event. A NotFound answer from the store means the cache was
   * stale, so the event is dropped locally as well.
   */
  async deleteEvent(eventId: string): Promise<Result<void, StoreError | ResolverError>> {
    const found = this.lookup(eventId);
    if (!found.success) return found;

    this.edits.set(eventId, { kind: 'delete' });
    try {
      await this.bounded('deleteEvent', () => this.options.store.deleteEvent(eventId), eventId);
      this.dropConfirmed(eventId);
      log.info('event_deleted', { eventId });
      this.notify('info', 'Event deleted');
      return ok(undefined);
    } catch (error) {
      const storeError = toStoreError(error, 'deleteEvent', eventId);
      if (storeError.kind === 'NotFound') {
        this.dropConfirmed(eventId);
      }
      log.warn('event_delete_failed', { eventId, kind: storeError.kind });
      this.notify('error', 'Failed to delete event');
      return fail(storeError);
    } finally {
      this.edits.delete(eventId);
    }
  }

  private dropConfirmed(eventId: string): void {
    this.confirmed = this.confirmed.filter((event) => event.id !== eventId);
  }

  // ---------------------------------------------------------------------------
  // Plumbing
  // ---------------------------------------------------------------------------

  /** Resolves once all background work (task mirroring) has finished. */
  async settle(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.all([...this.background]);
    }
  }

  private track(work: Promise<void>): void {
    const tracked: Promise<void> = work.finally(() => {
      this.background.delete(tracked);
    });
    this.background.add(tracked);
  }

  private notify(level: NoticeLevel, message: string): void {
    log.debug('notice', { level, message });
    this.options.notifier?.notify({ level, message, at: this.now() });
  }

  private async bounded<T>(operation: string, call: () => Promise<T>, eventId?: string): Promise<T> {
    const timeoutMs = this.options.storeTimeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(
          new StoreError('Unreachable', `Calendar did not answer ${operation} within ${timeoutMs}ms`, {
            operation,
            eventId,
            timeoutMs,
          })
        );
      }, timeoutMs);
    });

    try {
      // Store logs emitted during the call carry the operation and event id.
      return await Promise.race([withLogContext({ operation, eventId }, call), timeout]);
    } catch (error) {
      throw toStoreError(error, operation, eventId);
    } finally {
      clearTimeout(timer);
    }
  }
}
