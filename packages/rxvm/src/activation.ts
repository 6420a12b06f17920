import { EMPTY, map, merge, Observable, Subject, Subscription } from 'rxjs'
import { pickByAffinity, typeKeyOf, typeName } from './affinity'
import { RxvmError } from './errors'
import { logFor } from './logging'
import { subscribeToPropertyChain } from './observe'
import { Locator, serviceKey } from './registry'
import { isViewFor, ViewFor } from './view-for'

/**
 * Receives a subscription that is closed on deactivation; add everything
 * the activation sets up to it.
 */
export type ActivationBlock = (disposables: Subscription) => void

/**
 * Runs activation blocks when its owner becomes active and tears them down
 * when it stops being active. Activations are reference counted.
 */
export class ViewModelActivator {
    private readonly blocks: ActivationBlock[] = []
    private readonly activatedSubject = new Subject<void>()
    private readonly deactivatedSubject = new Subject<void>()
    private current = new Subscription()
    private refCount = 0

    get activated(): Observable<void> {
        return this.activatedSubject.asObservable()
    }

    get deactivated(): Observable<void> {
        return this.deactivatedSubject.asObservable()
    }

    get isActive(): boolean {
        return this.refCount > 0
    }

    addActivationBlock(block: ActivationBlock): void {
        this.blocks.push(block)
    }

    /**
     * The first activation runs every block. Closing the returned
     * subscription deactivates once.
     */
    activate(): Subscription {
        this.refCount++

        if (this.refCount === 1) {
            const disposables = new Subscription()

            for (const block of this.blocks) {
                block(disposables)
            }

            this.current = disposables
            this.activatedSubject.next()
        }

        return new Subscription(() => this.deactivate())
    }

    deactivate(ignoreRefCount = false): void {
        if (this.refCount === 0) {
            return
        }

        this.refCount = ignoreRefCount ? 0 : this.refCount - 1

        if (this.refCount === 0) {
            this.current.unsubscribe()
            this.current = new Subscription()
            this.deactivatedSubject.next()
        }
    }
}

export interface ActivatableViewModel {
    readonly activator: ViewModelActivator
}

export const isActivatableViewModel = (value: unknown): value is ActivatableViewModel => {
    return typeof value === 'object' && value !== null && Reflect.get(value, 'activator') instanceof ViewModelActivator
}

export function whenActivated(viewModel: ActivatableViewModel, block: ActivationBlock): void {
    viewModel.activator.addActivationBlock(block)
}

/**
 * Tells whether a view is currently shown, for the views it knows about.
 */
export interface ActivationForViewFetcher {
    getAffinityForView(view: object): number
    /** `true` when the view is shown, `false` when it goes away. */
    getActivationForView(view: object): Observable<boolean>
}

export const ActivationForViewFetcherKey = serviceKey<ActivationForViewFetcher>('ActivationForViewFetcher')

export interface CanActivate {
    readonly activated: Observable<unknown>
    readonly deactivated: Observable<unknown>
}

export const canActivate = (value: unknown): value is CanActivate => {
    return (
        typeof value === 'object' &&
        value !== null &&
        Reflect.get(value, 'activated') instanceof Observable &&
        Reflect.get(value, 'deactivated') instanceof Observable
    )
}

export class CanActivateViewFetcher implements ActivationForViewFetcher {
    getAffinityForView(view: object): number {
        return canActivate(view) ? 10 : 0
    }

    getActivationForView(view: object): Observable<boolean> {
        if (!canActivate(view)) {
            return EMPTY
        }

        return merge(view.activated.pipe(map(() => true)), view.deactivated.pipe(map(() => false)))
    }
}

const activationFetchers = (): ActivationForViewFetcher[] => {
    const registered = Locator.current.getServices(ActivationForViewFetcherKey)

    return registered.length > 0 ? registered : [new CanActivateViewFetcher()]
}

const log = logFor('Activation')

/**
 * Runs `block` each time `view` is shown and tears it down each time it goes
 * away. While the view is shown, its view model (when activatable) is
 * activated too, following view model swaps.
 */
export function whenViewActivated(view: object, block: ActivationBlock): Subscription {
    const fetcher = pickByAffinity(activationFetchers(), (candidate) => candidate.getAffinityForView(view))

    if (!fetcher) {
        throw new RxvmError(
            `Don't know how to detect when ${typeName(typeKeyOf(view))} is activated; register an ActivationForViewFetcher for it`,
            'ACTIVATION_UNSUPPORTED',
        )
    }

    const activation = fetcher.getActivationForView(view)
    const subscriptions = new Subscription()

    subscriptions.add(handleViewActivation(block, activation))

    if (isViewFor(view)) {
        subscriptions.add(handleViewModelActivation(view, activation))
    }

    return subscriptions
}

function handleViewActivation(block: ActivationBlock, activation: Observable<boolean>): Subscription {
    let current: Subscription | undefined

    const subscription = activation.subscribe((active) => {
        current?.unsubscribe()
        current = undefined

        if (active) {
            current = new Subscription()
            block(current)
        }
    })

    subscription.add(() => current?.unsubscribe())

    return subscription
}

function handleViewModelActivation(view: ViewFor, activation: Observable<boolean>): Subscription {
    let viewModelWatch: Subscription | undefined
    let viewModelActivation: Subscription | undefined

    const release = () => {
        viewModelWatch?.unsubscribe()
        viewModelActivation?.unsubscribe()
        viewModelWatch = undefined
        viewModelActivation = undefined
    }

    const subscription = activation.subscribe((active) => {
        release()

        if (!active) {
            return
        }

        viewModelWatch = subscribeToPropertyChain<ViewFor, unknown>(view, ['viewModel'], {
            skipInitial: false,
            suppressWarnings: true,
        }).subscribe((change) => {
            viewModelActivation?.unsubscribe()
            viewModelActivation = undefined

            if (isActivatableViewModel(change.value)) {
                log.debug(`Activating ${typeName(typeKeyOf(change.value))}`)
                viewModelActivation = change.value.activator.activate()
            }
        })
    })

    subscription.add(release)

    return subscription
}
