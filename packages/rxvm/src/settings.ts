import { asyncScheduler, Observable, Observer, observeOn, queueScheduler, SchedulerLike, Subject, Subscription } from 'rxjs'
import { UnhandledErrorException } from './errors'
import { logFor } from './logging'

export type Settings = {
    /** Scheduler results and state changes are delivered on. */
    mainScheduler: SchedulerLike
    /** Scheduler for work kept off the delivery path. */
    backgroundScheduler: SchedulerLike
    /** Receives errors that surfaced on a `thrownExceptions` stream nobody observes. */
    defaultExceptionHandler: Observer<unknown>
    smallCacheLimit: number
    bigCacheLimit: number
    suppressViewCommandBindingMessage: boolean
}

const log = logFor('DefaultExceptionHandler')

export const rethrowingExceptionHandler: Observer<unknown> = {
    next(error) {
        log.error('Unhandled error surfaced through thrownExceptions', error)

        setTimeout(() => {
            throw new UnhandledErrorException(error)
        })
    },
    error(error) {
        this.next(error)
    },
    complete() {},
}

const createDefaults = (): Settings => ({
    mainScheduler: queueScheduler,
    backgroundScheduler: asyncScheduler,
    defaultExceptionHandler: rethrowingExceptionHandler,
    smallCacheLimit: 64,
    bigCacheLimit: 256,
    suppressViewCommandBindingMessage: false,
})

export const settings: Settings = createDefaults()

/**
 * Overrides some settings until the returned subscription is closed.
 */
export function configure(overrides: Partial<Settings>): Subscription {
    const previous: Settings = { ...settings }

    Object.assign(settings, overrides)

    return new Subscription(() => {
        Object.assign(settings, previous)
    })
}

export function resetSettings(): void {
    Object.assign(settings, createDefaults())
}

/**
 * A subject that delivers on `scheduler` and forwards values to
 * `defaultObserver` while nothing is subscribed.
 */
export class ScheduledSubject<T> implements Observer<T> {
    private readonly subject = new Subject<T>()
    private observerCount = 0

    constructor(
        private readonly scheduler?: SchedulerLike,
        private readonly defaultObserver?: () => Observer<T>,
    ) {}

    get observed(): boolean {
        return this.observerCount > 0
    }

    next(value: T): void {
        if (this.observerCount === 0 && this.defaultObserver) {
            const fallback = this.defaultObserver()

            if (this.scheduler) {
                this.scheduler.schedule(() => fallback.next(value))
            } else {
                fallback.next(value)
            }

            return
        }

        this.subject.next(value)
    }

    error(error: unknown): void {
        this.subject.error(error)
    }

    complete(): void {
        this.subject.complete()
    }

    asObservable(): Observable<T> {
        return new Observable<T>((subscriber) => {
            this.observerCount++

            const source = this.scheduler ? this.subject.pipe(observeOn(this.scheduler)) : this.subject
            const subscription = source.subscribe(subscriber)

            return () => {
                this.observerCount--
                subscription.unsubscribe()
            }
        })
    }
}

export const exceptionSubject = <T = unknown>(scheduler?: SchedulerLike): ScheduledSubject<T> => {
    return new ScheduledSubject<T>(scheduler, () => settings.defaultExceptionHandler)
}
