import { defer, filter, finalize, map, Observable, observeOn, SchedulerLike, Subject, Subscription } from 'rxjs'
import { typeKeyOf, typeName } from './affinity'
import { logFor } from './logging'
import { isReactiveObject, ReactiveObject } from './reactive-object'
import { settings } from './settings'

export type CollectionChange<T> =
    | { type: 'add'; index: number; items: readonly T[] }
    | { type: 'remove'; index: number; items: readonly T[] }
    | { type: 'replace'; index: number; oldItem: T; newItem: T }
    | { type: 'move'; from: number; to: number; items: readonly T[] }
    | { type: 'reset' }

export type MoveInfo<T> = {
    items: readonly T[]
    from: number
    to: number
}

export type ItemChangedEvent<T> = {
    sender: T
    propertyName: string
}

type ItemTracker = {
    refCount: number
    subscription: Subscription
}

const resetMinimum = 10

function lengthDelta<T>(change: CollectionChange<T>): number {
    switch (change.type) {
        case 'add':
            return change.items.length
        case 'remove':
            return -change.items.length
        default:
            return 0
    }
}

/**
 * An observable list. Every mutation is announced on `collectionChanging`
 * before it happens and on `collectionChanged` after it, with per-kind
 * streams for added, removed and moved items. `length` and `isEmpty` are
 * raised as property changes.
 *
 * While notifications are suppressed nothing is announced; releasing the
 * last suppression announces a single reset.
 */
export class ReadOnlyReactiveList<T> extends ReactiveObject implements Iterable<T> {
    /** Share of the list a range operation must touch before it announces a reset instead. */
    resetChangeThreshold: number

    private readonly items: T[]
    private readonly collectionChangingSubject = new Subject<CollectionChange<T>>()
    private readonly collectionChangedSubject = new Subject<CollectionChange<T>>()
    private readonly beforeItemsAddedSubject = new Subject<readonly T[]>()
    private readonly itemsAddedSubject = new Subject<readonly T[]>()
    private readonly beforeItemsRemovedSubject = new Subject<readonly T[]>()
    private readonly itemsRemovedSubject = new Subject<readonly T[]>()
    private readonly beforeItemsMovedSubject = new Subject<MoveInfo<T>>()
    private readonly itemsMovedSubject = new Subject<MoveInfo<T>>()
    private readonly itemChangingSubject = new Subject<ItemChangedEvent<T>>()
    private readonly itemChangedSubject = new Subject<ItemChangedEvent<T>>()
    private listSuppressedCount = 0
    private lengthBeforeSuppression = 0
    private resetObservers = 0
    private warnedAboutReset = false
    private trackers: Map<T, ItemTracker> | undefined
    private readonly untrackableTypes = new Set<string>()
    protected readonly log = logFor(this)

    constructor(initialItems: Iterable<T> = [], resetChangeThreshold = 0.3) {
        super()
        this.items = [...initialItems]
        this.resetChangeThreshold = resetChangeThreshold
    }

    get length(): number {
        return this.items.length
    }

    get isEmpty(): boolean {
        return this.items.length === 0
    }

    get collectionChanging(): Observable<CollectionChange<T>> {
        return this.collectionChangingSubject.asObservable()
    }

    get collectionChanged(): Observable<CollectionChange<T>> {
        return this.collectionChangedSubject.asObservable()
    }

    get beforeItemsAdded(): Observable<readonly T[]> {
        return this.beforeItemsAddedSubject.asObservable()
    }

    get itemsAdded(): Observable<readonly T[]> {
        return this.itemsAddedSubject.asObservable()
    }

    get beforeItemsRemoved(): Observable<readonly T[]> {
        return this.beforeItemsRemovedSubject.asObservable()
    }

    get itemsRemoved(): Observable<readonly T[]> {
        return this.itemsRemovedSubject.asObservable()
    }

    get beforeItemsMoved(): Observable<MoveInfo<T>> {
        return this.beforeItemsMovedSubject.asObservable()
    }

    get itemsMoved(): Observable<MoveInfo<T>> {
        return this.itemsMovedSubject.asObservable()
    }

    /** Property changes of the items, while change tracking is enabled. */
    get itemChanging(): Observable<ItemChangedEvent<T>> {
        return this.itemChangingSubject.asObservable()
    }

    get itemChanged(): Observable<ItemChangedEvent<T>> {
        return this.itemChangedSubject.asObservable()
    }

    /** The length before each change that alters it. */
    get countChanging(): Observable<number> {
        return this.changing.pipe(
            filter((event) => event.propertyName === 'length'),
            map(() => this.items.length),
        )
    }

    get countChanged(): Observable<number> {
        return this.changed.pipe(
            filter((event) => event.propertyName === 'length'),
            map(() => this.items.length),
        )
    }

    get isEmptyChanged(): Observable<boolean> {
        return this.changed.pipe(
            filter((event) => event.propertyName === 'isEmpty'),
            map(() => this.items.length === 0),
        )
    }

    /** Emits whenever observers should drop what they know and re-read the list. */
    get shouldReset(): Observable<void> {
        return defer(() => {
            this.resetObservers++

            return this.collectionChangedSubject.pipe(
                filter((change) => change.type === 'reset'),
                map((): void => undefined),
                finalize(() => {
                    this.resetObservers--
                }),
            )
        })
    }

    get changeTrackingEnabled(): boolean {
        return this.trackers !== undefined
    }

    /**
     * Forwards property changes of `ReactiveObject` items to `itemChanging`
     * and `itemChanged`.
     */
    set changeTrackingEnabled(enabled: boolean) {
        if (enabled === this.changeTrackingEnabled) {
            return
        }

        if (enabled) {
            this.trackers = new Map()
            this.track(this.items)
            return
        }

        for (const tracker of this.trackers?.values() ?? []) {
            tracker.subscription.unsubscribe()
        }

        this.trackers = undefined
    }

    at(index: number): T | undefined {
        return this.items[index]
    }

    indexOf(item: T): number {
        return this.items.indexOf(item)
    }

    includes(item: T): boolean {
        return this.items.includes(item)
    }

    toArray(): T[] {
        return [...this.items]
    }

    [Symbol.iterator](): Iterator<T> {
        return this.items[Symbol.iterator]()
    }

    suppressChangeNotifications(): Subscription {
        if (!this.warnedAboutReset && this.resetObservers === 0 && !this.collectionChangedSubject.observed) {
            this.warnedAboutReset = true
            this.log.warn('Notifications are suppressed but nothing observes shouldReset, observers will miss the reset')
        }

        return this.beginSuppression()
    }

    /** Announces a reset. */
    reset(): void {
        this.publishReset(this.items.length)
    }

    protected beginSuppression(): Subscription {
        if (this.listSuppressedCount === 0) {
            this.lengthBeforeSuppression = this.items.length
        }

        this.listSuppressedCount++
        const properties = super.suppressChangeNotifications()

        return new Subscription(() => {
            properties.unsubscribe()
            this.listSuppressedCount--

            if (this.listSuppressedCount === 0) {
                this.publishReset(this.lengthBeforeSuppression)
            }
        })
    }

    /** Runs `apply` under suppression when `count` items exceed the reset threshold. */
    protected batch(count: number, apply: () => void): void {
        // an empty list divides to Infinity, so large first loads reset too
        if (count <= resetMinimum || count / this.items.length <= this.resetChangeThreshold) {
            apply()
            return
        }

        const suppression = this.suppressChangeNotifications()

        try {
            apply()
        } finally {
            suppression.unsubscribe()
        }
    }

    protected insertItems(index: number, added: readonly T[]): void {
        this.checkRange(index, 0, this.items.length)

        if (added.length === 0) {
            return
        }

        this.applyChange({ type: 'add', index, items: added }, () => {
            this.items.splice(index, 0, ...added)
        })
    }

    protected removeItems(index: number, count: number): T[] {
        this.checkRange(index, count, this.items.length)

        if (count === 0) {
            return []
        }

        const removed = this.items.slice(index, index + count)

        this.applyChange({ type: 'remove', index, items: removed }, () => {
            this.items.splice(index, count)
        })

        return removed
    }

    protected replaceItem(index: number, item: T): void {
        this.checkRange(index, 1, this.items.length)
        const oldItem = this.items[index]

        if (Object.is(oldItem, item)) {
            return
        }

        this.applyChange({ type: 'replace', index, oldItem, newItem: item }, () => {
            this.items[index] = item
        })
    }

    protected moveItem(from: number, to: number): void {
        this.checkRange(from, 1, this.items.length)
        this.checkRange(to, 1, this.items.length)

        if (from === to) {
            return
        }

        this.applyChange({ type: 'move', from, to, items: [this.items[from]] }, () => {
            const [item] = this.items.splice(from, 1)
            this.items.splice(to, 0, item)
        })
    }

    /** Rearranges the items in place, then announces a reset. */
    protected reorderItems(compare?: (left: T, right: T) => number): void {
        this.items.sort(compare)

        if (this.listSuppressedCount === 0) {
            this.publishReset(this.items.length)
        }
    }

    private applyChange(change: CollectionChange<T>, apply: () => void): void {
        if (this.listSuppressedCount > 0) {
            apply()
            this.trackChange(change)
            return
        }

        const lengthBefore = this.items.length

        this.collectionChangingSubject.next(change)
        this.announceBefore(change)

        if (lengthDelta(change) !== 0) {
            this.raisePropertyChanging('length')
        }

        apply()

        this.collectionChangedSubject.next(change)
        this.raiseLengthChanged(lengthBefore)
        this.announceAfter(change)
        this.trackChange(change)
    }

    private announceBefore(change: CollectionChange<T>): void {
        switch (change.type) {
            case 'add':
                this.beforeItemsAddedSubject.next(change.items)
                break
            case 'remove':
                this.beforeItemsRemovedSubject.next(change.items)
                break
            case 'replace':
                this.beforeItemsRemovedSubject.next([change.oldItem])
                this.beforeItemsAddedSubject.next([change.newItem])
                break
            case 'move':
                this.beforeItemsMovedSubject.next({ items: change.items, from: change.from, to: change.to })
                break
        }
    }

    private announceAfter(change: CollectionChange<T>): void {
        switch (change.type) {
            case 'add':
                this.itemsAddedSubject.next(change.items)
                break
            case 'remove':
                this.itemsRemovedSubject.next(change.items)
                break
            case 'replace':
                this.itemsRemovedSubject.next([change.oldItem])
                this.itemsAddedSubject.next([change.newItem])
                break
            case 'move':
                this.itemsMovedSubject.next({ items: change.items, from: change.from, to: change.to })
                break
        }
    }

    private publishReset(lengthBefore: number): void {
        const change: CollectionChange<T> = { type: 'reset' }

        this.collectionChangingSubject.next(change)
        this.collectionChangedSubject.next(change)
        this.raiseLengthChanged(lengthBefore)
    }

    private raiseLengthChanged(lengthBefore: number): void {
        if (lengthBefore === this.items.length) {
            return
        }

        this.raisePropertyChanged('length')

        if ((lengthBefore === 0) !== (this.items.length === 0)) {
            this.raisePropertyChanged('isEmpty')
        }
    }

    private checkRange(index: number, count: number, length: number): void {
        if (!Number.isInteger(index) || index < 0 || count < 0 || index + count > length) {
            throw new RangeError(`[rxvm] Index ${index} with count ${count} is out of range for length ${length}`)
        }
    }

    private trackChange(change: CollectionChange<T>): void {
        switch (change.type) {
            case 'add':
                this.track(change.items)
                break
            case 'remove':
                this.untrack(change.items)
                break
            case 'replace':
                this.untrack([change.oldItem])
                this.track([change.newItem])
                break
        }
    }

    private track(items: readonly T[]): void {
        const trackers = this.trackers

        if (!trackers) {
            return
        }

        for (const item of items) {
            const existing = trackers.get(item)

            if (existing) {
                existing.refCount++
                continue
            }

            if (!isReactiveObject(item)) {
                this.warnUntrackable(item)
                continue
            }

            const subscription = new Subscription()

            subscription.add(
                item.changing.subscribe((event) => {
                    if (this.listSuppressedCount === 0) {
                        this.itemChangingSubject.next({ sender: item, propertyName: event.propertyName })
                    }
                }),
            )
            subscription.add(
                item.changed.subscribe((event) => {
                    if (this.listSuppressedCount === 0) {
                        this.itemChangedSubject.next({ sender: item, propertyName: event.propertyName })
                    }
                }),
            )

            trackers.set(item, { refCount: 1, subscription })
        }
    }

    private untrack(items: readonly T[]): void {
        const trackers = this.trackers

        if (!trackers) {
            return
        }

        for (const item of items) {
            const tracker = trackers.get(item)

            if (!tracker) {
                continue
            }

            tracker.refCount--

            if (tracker.refCount === 0) {
                tracker.subscription.unsubscribe()
                trackers.delete(item)
            }
        }
    }

    private warnUntrackable(item: T): void {
        const name = typeName(typeKeyOf(item))

        if (this.untrackableTypes.has(name)) {
            return
        }

        this.untrackableTypes.add(name)
        this.log.warn(`Change tracking is enabled but ${name} is not a ReactiveObject, its changes are not tracked`)
    }
}

/**
 * A mutable observable list.
 *
 * ```ts
 * const todos = new ReactiveList<TodoViewModel>()
 * todos.changeTrackingEnabled = true
 * todos.itemChanged.subscribe(({ sender }) => save(sender))
 * ```
 */
export class ReactiveList<T> extends ReadOnlyReactiveList<T> {
    add(item: T): void {
        this.insertItems(this.length, [item])
    }

    insert(index: number, item: T): void {
        this.insertItems(index, [item])
    }

    addRange(items: Iterable<T>): void {
        this.insertRange(this.length, items)
    }

    insertRange(index: number, items: Iterable<T>): void {
        const added = [...items]

        this.batch(added.length, () => {
            this.insertItems(index, added)
        })
    }

    set(index: number, item: T): void {
        this.replaceItem(index, item)
    }

    remove(item: T): boolean {
        const index = this.indexOf(item)

        if (index < 0) {
            return false
        }

        this.removeItems(index, 1)
        return true
    }

    removeAt(index: number): T {
        const [removed] = this.removeItems(index, 1)
        return removed
    }

    removeRange(index: number, count: number): T[] {
        let removed: T[] = []

        this.batch(count, () => {
            removed = this.removeItems(index, count)
        })

        return removed
    }

    /** Removes one occurrence of each given item. */
    removeAll(items: Iterable<T>): void {
        const doomed = [...items]

        this.batch(doomed.length, () => {
            for (const item of doomed) {
                this.remove(item)
            }
        })
    }

    move(from: number, to: number): void {
        this.moveItem(from, to)
    }

    clear(): void {
        if (this.isEmpty) {
            return
        }

        const suppression = this.beginSuppression()

        try {
            this.removeItems(0, this.length)
        } finally {
            suppression.unsubscribe()
        }
    }

    sort(compare?: (left: T, right: T) => number): void {
        this.reorderItems(compare)
    }
}

export type DerivedCollectionOptions<Source, Value> = {
    /** Source items failing the filter are left out. */
    filter?: (item: Source) => boolean
    /** Source order is kept when absent. */
    orderer?: (left: Value, right: Value) => number
    /** Sees every value that leaves the collection, disposal included. */
    onRemoved?: (value: Value) => void
    /** Each emission selects every value again. */
    signalReset?: Observable<unknown>
    /** Where source changes are applied; `settings.mainScheduler` by default. */
    scheduler?: SchedulerLike
}

/**
 * A read-only projection of another list. It follows the source's
 * collection changes and, when the source tracks changes, re-selects only
 * the items whose properties changed.
 */
export class ReactiveDerivedCollection<Source, Value> extends ReadOnlyReactiveList<Value> {
    private readonly selections = new Map<Source, { value: Value }>()
    private readonly subscriptions = new Subscription()
    private readonly source: ReadOnlyReactiveList<Source> | readonly Source[]
    private readonly selector: (item: Source) => Value
    private readonly options: DerivedCollectionOptions<Source, Value>

    constructor(
        source: ReadOnlyReactiveList<Source> | readonly Source[],
        selector: (item: Source) => Value,
        options: DerivedCollectionOptions<Source, Value> = {},
    ) {
        super()
        this.source = source
        this.selector = selector
        this.options = options
        this.refresh(undefined)
        this.wire()
    }

    /** Selects every value again and announces a single reset. */
    reset(): void {
        const suppression = this.beginSuppression()

        try {
            this.selections.clear()
            this.refresh(undefined)
        } finally {
            suppression.unsubscribe()
        }
    }

    dispose(): void {
        this.subscriptions.unsubscribe()

        for (const value of this) {
            this.options.onRemoved?.(value)
        }
    }

    private wire(): void {
        const scheduler = this.options.scheduler ?? settings.mainScheduler

        if (this.source instanceof ReadOnlyReactiveList) {
            this.subscriptions.add(
                this.source.collectionChanged.pipe(observeOn(scheduler)).subscribe(() => this.refresh(undefined)),
            )
            this.subscriptions.add(
                this.source.itemChanged.pipe(observeOn(scheduler)).subscribe((event) => this.refresh({ item: event.sender })),
            )
        } else {
            this.log.warn('The source is a plain array, the collection only updates on signalReset')
        }

        if (this.options.signalReset) {
            this.subscriptions.add(this.options.signalReset.pipe(observeOn(scheduler)).subscribe(() => this.reset()))
        }
    }

    private refresh(changed: { item: Source } | undefined): void {
        if (changed) {
            this.selections.delete(changed.item)
        }

        const include = this.options.filter ?? (() => true)
        const present = new Set<Source>()
        const target: Value[] = []

        for (const item of this.source) {
            present.add(item)

            if (include(item)) {
                target.push(this.select(item))
            }
        }

        for (const item of [...this.selections.keys()]) {
            if (!present.has(item)) {
                this.selections.delete(item)
            }
        }

        if (this.options.orderer) {
            target.sort(this.options.orderer)
        }

        this.reconcile(target)
    }

    private select(item: Source): Value {
        const cached = this.selections.get(item)

        if (cached) {
            return cached.value
        }

        const value = this.selector(item)
        this.selections.set(item, { value })
        return value
    }

    /** Turns the current values into `target` with removes, moves and inserts. */
    private reconcile(target: readonly Value[]): void {
        const wanted = new Map<Value, number>()

        for (const value of target) {
            wanted.set(value, (wanted.get(value) ?? 0) + 1)
        }

        const current = this.toArray()

        for (let i = current.length - 1; i >= 0; i--) {
            const remaining = wanted.get(current[i]) ?? 0

            if (remaining > 0) {
                wanted.set(current[i], remaining - 1)
                continue
            }

            const [removed] = this.removeItems(i, 1)
            this.options.onRemoved?.(removed)
        }

        for (let i = 0; i < target.length; i++) {
            if (i < this.length && Object.is(this.at(i), target[i])) {
                continue
            }

            const found = this.toArray().indexOf(target[i], i + 1)

            if (found >= 0) {
                this.moveItem(found, i)
            } else {
                this.insertItems(i, [target[i]])
            }
        }
    }
}

export function createDerivedCollection<Source, Value>(
    source: ReadOnlyReactiveList<Source> | readonly Source[],
    selector: (item: Source) => Value,
    options?: DerivedCollectionOptions<Source, Value>,
): ReactiveDerivedCollection<Source, Value> {
    return new ReactiveDerivedCollection(source, selector, options)
}
