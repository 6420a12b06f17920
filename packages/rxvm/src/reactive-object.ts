import { Observable, Subject, Subscription } from 'rxjs'

export type PropertyChangedEvent<Sender> = {
    sender: Sender
    propertyName: string
}

export interface ReactiveObjectLike {
    readonly changing: Observable<PropertyChangedEvent<this>>
    readonly changed: Observable<PropertyChangedEvent<this>>
    raisePropertyChanging(propertyName: string): void
    raisePropertyChanged(propertyName: string): void
}

export const isReactiveObject = (value: unknown): value is ReactiveObjectLike => {
    return value instanceof ReactiveObject
}

/**
 * Keeps the last occurrence of every property name, in the order those last
 * occurrences were raised.
 */
export function dedupByPropertyName<Sender>(batch: Array<PropertyChangedEvent<Sender>>): Array<PropertyChangedEvent<Sender>> {
    if (batch.length <= 1) {
        return batch
    }

    const seen = new Set<string>()
    const unique: Array<PropertyChangedEvent<Sender>> = []

    for (let i = batch.length - 1; i >= 0; i--) {
        if (!seen.has(batch[i].propertyName)) {
            seen.add(batch[i].propertyName)
            unique.unshift(batch[i])
        }
    }

    return unique
}

/**
 * Base class for view models. Subclasses keep their state in a backing object
 * and route writes through `raiseAndSetIfChanged`:
 *
 * ```ts
 * class LoginViewModel extends ReactiveObject {
 *     private state = { userName: '' }
 *
 *     get userName() {
 *         return this.state.userName
 *     }
 *
 *     set userName(value: string) {
 *         this.raiseAndSetIfChanged(this.state, 'userName', value)
 *     }
 * }
 * ```
 */
export class ReactiveObject implements ReactiveObjectLike {
    private readonly changingSubject = new Subject<PropertyChangedEvent<this>>()
    private readonly changedSubject = new Subject<PropertyChangedEvent<this>>()
    private suppressedCount = 0
    private delayedCount = 0
    private pendingChanging: Array<PropertyChangedEvent<this>> = []
    private pendingChanged: Array<PropertyChangedEvent<this>> = []

    get changing(): Observable<PropertyChangedEvent<this>> {
        return this.changingSubject.asObservable()
    }

    get changed(): Observable<PropertyChangedEvent<this>> {
        return this.changedSubject.asObservable()
    }

    areChangeNotificationsEnabled(): boolean {
        return this.suppressedCount === 0
    }

    areChangeNotificationsDelayed(): boolean {
        return this.delayedCount > 0
    }

    /**
     * Nothing is raised until every returned subscription is closed.
     */
    suppressChangeNotifications(): Subscription {
        this.suppressedCount++

        return new Subscription(() => {
            this.suppressedCount--
        })
    }

    /**
     * Notifications are queued until every returned subscription is closed,
     * then released once per property.
     */
    delayChangeNotifications(): Subscription {
        this.delayedCount++

        return new Subscription(() => {
            this.delayedCount--

            if (this.delayedCount === 0) {
                this.flushDelayed()
            }
        })
    }

    raisePropertyChanging(propertyName: string): void {
        if (!this.areChangeNotificationsEnabled()) {
            return
        }

        const event: PropertyChangedEvent<this> = { sender: this, propertyName }

        if (this.areChangeNotificationsDelayed()) {
            this.pendingChanging.push(event)
        } else {
            this.changingSubject.next(event)
        }
    }

    raisePropertyChanged(propertyName: string): void {
        if (!this.areChangeNotificationsEnabled()) {
            return
        }

        const event: PropertyChangedEvent<this> = { sender: this, propertyName }

        if (this.areChangeNotificationsDelayed()) {
            this.pendingChanged.push(event)
        } else {
            this.changedSubject.next(event)
        }
    }

    /**
     * Writes `value` into `backing[key]` and raises changing/changed around
     * the write, unless the value is unchanged.
     */
    protected raiseAndSetIfChanged<Backing extends object, Key extends keyof Backing & string>(
        backing: Backing,
        key: Key,
        value: Backing[Key],
        propertyName: string = key,
    ): Backing[Key] {
        if (Object.is(backing[key], value)) {
            return value
        }

        this.raisePropertyChanging(propertyName)
        backing[key] = value
        this.raisePropertyChanged(propertyName)

        return value
    }

    private flushDelayed(): void {
        const changing = dedupByPropertyName(this.pendingChanging)
        const changed = dedupByPropertyName(this.pendingChanged)

        this.pendingChanging = []
        this.pendingChanged = []

        for (const event of changing) {
            this.changingSubject.next(event)
        }

        for (const event of changed) {
            this.changedSubject.next(event)
        }
    }
}
