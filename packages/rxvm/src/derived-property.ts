import { distinctUntilChanged, Observable, observeOn, SchedulerLike, Subscription } from 'rxjs'
import { ReactiveObjectLike } from './reactive-object'
import { exceptionSubject, ScheduledSubject, settings } from './settings'

export type DerivedPropertyOptions<T> = {
    initialValue: T
    /** Subscribe to the source on the first `value` read instead of immediately. */
    deferSubscription?: boolean
    scheduler?: SchedulerLike
}

/**
 * A read-only property whose value follows an observable. Every distinct new
 * value raises changing/changed on the owner under `propertyName`.
 */
export class DerivedProperty<T> {
    private current: T
    private subscription: Subscription | undefined
    private readonly exceptions: ScheduledSubject<unknown>
    private readonly scheduler: SchedulerLike
    private disposed = false

    constructor(
        private readonly source: Observable<T>,
        private readonly owner: ReactiveObjectLike | undefined,
        readonly propertyName: string,
        options: DerivedPropertyOptions<T>,
    ) {
        this.current = options.initialValue
        this.scheduler = options.scheduler ?? settings.mainScheduler
        this.exceptions = exceptionSubject(this.scheduler)

        if (!options.deferSubscription) {
            this.connect()
        }
    }

    get value(): T {
        if (!this.subscription && !this.disposed) {
            this.connect()
        }

        return this.current
    }

    get isSubscribed(): boolean {
        return this.subscription !== undefined
    }

    get thrownExceptions(): Observable<unknown> {
        return this.exceptions.asObservable()
    }

    dispose(): void {
        this.disposed = true
        this.subscription?.unsubscribe()
        this.subscription = undefined
        this.exceptions.complete()
    }

    private connect(): void {
        this.subscription = this.source
            .pipe(
                distinctUntilChanged((a, b) => Object.is(a, b)),
                observeOn(this.scheduler),
            )
            .subscribe({
                next: (value) => this.update(value),
                error: (error: unknown) => this.exceptions.next(error),
            })
    }

    private update(value: T): void {
        if (Object.is(value, this.current)) {
            return
        }

        this.owner?.raisePropertyChanging(this.propertyName)
        this.current = value
        this.owner?.raisePropertyChanged(this.propertyName)
    }
}

export function toProperty<T>(
    source: Observable<T>,
    owner: ReactiveObjectLike | undefined,
    propertyName: string,
    options: DerivedPropertyOptions<T>,
): DerivedProperty<T> {
    return new DerivedProperty(source, owner, propertyName, options)
}
