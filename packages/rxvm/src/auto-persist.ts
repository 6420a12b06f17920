import { catchError, debounceTime, defer, EMPTY, filter, from, map, merge, mergeMap, Observable, SchedulerLike, Subscription } from 'rxjs'
import { logFor } from './logging'
import { ReactiveObjectLike } from './reactive-object'
import { settings } from './settings'

export type AutoPersistOptions = {
    /** Quiet period after the last change before saving, in milliseconds. Defaults to 3000. */
    interval?: number
    /** Only changes to these properties trigger a save. Defaults to every property. */
    properties?: readonly string[]
    /** Emitting on this stream schedules a save as if a property had changed. */
    manualSaveSignal?: Observable<unknown>
    scheduler?: SchedulerLike
}

/**
 * Saves `target` with `persist` once changes have settled. Returns the
 * subscription that stops saving.
 */
export function autoPersist<T extends ReactiveObjectLike>(
    target: T,
    persist: (target: T) => Observable<unknown> | Promise<unknown>,
    options: AutoPersistOptions = {},
): Subscription {
    const { interval = 3000, properties, manualSaveSignal, scheduler = settings.backgroundScheduler } = options
    const log = logFor(target)

    const changes = target.changed.pipe(
        filter((event) => properties === undefined || properties.includes(event.propertyName)),
        map(() => undefined),
    )

    const saveHint = manualSaveSignal ? merge(changes, manualSaveSignal) : changes

    return saveHint
        .pipe(
            debounceTime(interval, scheduler),
            mergeMap(() =>
                defer(() => from(persist(target))).pipe(
                    catchError((error: unknown) => {
                        log.error('Failed to persist', error)
                        return EMPTY
                    }),
                ),
            ),
        )
        .subscribe()
}
