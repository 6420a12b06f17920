import { BehaviorSubject, map, Observable, SchedulerLike } from 'rxjs'
import { ReactiveCommand } from './command'
import { ReactiveObject } from './reactive-object'

export interface RoutableViewModel {
    /** A short name for the page, usable in a URL. */
    readonly urlPathSegment?: string
    readonly hostScreen: Screen
}

/** The root of a navigation tree. */
export interface Screen {
    readonly router: RoutingState
}

/**
 * A navigation stack of view models. The last entry is the current page.
 */
export class RoutingState extends ReactiveObject {
    private readonly stack = new BehaviorSubject<readonly RoutableViewModel[]>([])

    readonly navigate: ReactiveCommand<RoutableViewModel, RoutableViewModel>
    readonly navigateBack: ReactiveCommand<void, RoutableViewModel | undefined>
    readonly navigateAndReset: ReactiveCommand<RoutableViewModel, RoutableViewModel>

    constructor(scheduler?: SchedulerLike) {
        super()

        const options = { outputScheduler: scheduler }

        this.navigate = ReactiveCommand.create((viewModel: RoutableViewModel) => {
            this.setStack([...this.stack.value, viewModel])
            return viewModel
        }, options)

        this.navigateBack = ReactiveCommand.create(
            () => {
                this.setStack(this.stack.value.slice(0, -1))
                return this.getCurrentViewModel()
            },
            { ...options, canExecute: this.stack.pipe(map((stack) => stack.length > 1)) },
        )

        this.navigateAndReset = ReactiveCommand.create((viewModel: RoutableViewModel) => {
            this.setStack([viewModel])
            return viewModel
        }, options)
    }

    get navigationStack(): readonly RoutableViewModel[] {
        return this.stack.value
    }

    /** The stack after every navigation, starting with the current one. */
    get navigationChanged(): Observable<readonly RoutableViewModel[]> {
        return this.stack.asObservable()
    }

    get currentViewModel(): Observable<RoutableViewModel | undefined> {
        return this.stack.pipe(map((stack) => stack[stack.length - 1]))
    }

    getCurrentViewModel(): RoutableViewModel | undefined {
        const stack = this.stack.value
        return stack[stack.length - 1]
    }

    clear(): void {
        this.setStack([])
    }

    private setStack(stack: readonly RoutableViewModel[]): void {
        this.raisePropertyChanging('navigationStack')
        this.stack.next(stack)
        this.raisePropertyChanged('navigationStack')
    }
}
