import {
    AsyncSubject,
    catchError,
    combineLatest,
    defer,
    distinctUntilChanged,
    EMPTY,
    filter,
    finalize,
    map,
    mergeMap,
    Observable,
    Observer,
    observeOn,
    of,
    scan,
    SchedulerLike,
    share,
    shareReplay,
    startWith,
    Subject,
    Subscription,
    tap,
    throwError,
    withLatestFrom,
} from 'rxjs'
import { RxvmError } from './errors'
import { exceptionSubject, ScheduledSubject, settings } from './settings'

/**
 * The imperative command protocol bindings talk to: ask, then fire.
 */
export interface BindableCommand<Param = unknown> {
    readonly canExecuteChanged: Observable<boolean>
    canExecuteNow(parameter?: Param): boolean
    executeNow(parameter?: Param): void
}

export const isBindableCommand = (value: unknown): value is BindableCommand => {
    return (
        typeof value === 'object' &&
        value !== null &&
        typeof Reflect.get(value, 'canExecuteNow') === 'function' &&
        typeof Reflect.get(value, 'executeNow') === 'function' &&
        Reflect.get(value, 'canExecuteChanged') instanceof Observable
    )
}

export type CommandOptions = {
    /** Gate for execution; an error on this stream counts as `false`. Defaults to always executable. */
    canExecute?: Observable<boolean>
    /** Where results, state changes and exceptions are delivered. Defaults to `settings.mainScheduler`. */
    outputScheduler?: SchedulerLike
    /** How many executions may be in flight before `canExecute` turns false. Defaults to 1. */
    maxConcurrent?: number
}

type ExecutionInfo<Result> = { type: 'begin' } | { type: 'result'; value: Result } | { type: 'end' }

export class ReactiveCommand<Param = void, Result = void> implements BindableCommand<Param> {
    static create<Param = void, Result = void>(
        execute: (parameter: Param) => Result,
        options?: CommandOptions,
    ): ReactiveCommand<Param, Result> {
        return new ReactiveCommand<Param, Result>(
            (parameter) =>
                new Observable<Result>((subscriber) => {
                    subscriber.next(execute(parameter))
                    subscriber.complete()
                }),
            options,
        )
    }

    static createFromObservable<Param = void, Result = void>(
        execute: (parameter: Param) => Observable<Result>,
        options?: CommandOptions,
    ): ReactiveCommand<Param, Result> {
        return new ReactiveCommand<Param, Result>(execute, options)
    }

    /**
     * The signal aborts when every subscriber of the execution unsubscribes
     * before the promise settles.
     */
    static createFromPromise<Param = void, Result = void>(
        execute: (parameter: Param, signal: AbortSignal) => Promise<Result>,
        options?: CommandOptions,
    ): ReactiveCommand<Param, Result> {
        return new ReactiveCommand<Param, Result>(
            (parameter) =>
                new Observable<Result>((subscriber) => {
                    const controller = new AbortController()

                    execute(parameter, controller.signal).then(
                        (value) => {
                            subscriber.next(value)
                            subscriber.complete()
                        },
                        (error: unknown) => subscriber.error(error),
                    )

                    return () => controller.abort()
                }),
            options,
        )
    }

    /**
     * Runs every child with the same parameter and emits their results in
     * child order. Executable only while every child is.
     */
    static createCombined<Param, Result>(
        children: ReadonlyArray<ReactiveCommand<Param, Result>>,
        options: CommandOptions = {},
    ): ReactiveCommand<Param, Result[]> {
        if (children.length === 0) {
            throw new RxvmError('A combined command needs at least one child command')
        }

        const childrenCanExecute = combineLatest(children.map((child) => child.canExecute)).pipe(
            map((states) => states.every(Boolean)),
        )
        const canExecute = combineLatest([options.canExecute ?? of(true), childrenCanExecute]).pipe(
            map(([own, all]) => own && all),
        )

        // child failures reach thrownExceptions through the children, not through the combined run
        const combined = new ReactiveCommand<Param, Result[]>(
            (parameter) => combineLatest(children.map((child) => child.execute(parameter))),
            { ...options, canExecute },
            false,
        )

        for (const child of children) {
            combined.subscriptions.add(child.thrownExceptions.subscribe((error) => combined.exceptions.next(error)))
        }

        return combined
    }

    private readonly executionInfo = new Subject<ExecutionInfo<Result>>()
    private readonly exceptions: ScheduledSubject<unknown>
    private readonly outputScheduler: SchedulerLike
    private readonly subscriptions = new Subscription()
    private readonly isExecuting$: Observable<boolean>
    private readonly canExecute$: Observable<boolean>
    private readonly results$: Observable<Result>
    private latestCanExecute = false
    private running = 0
    private readonly maxConcurrent: number

    private constructor(
        private readonly executeFn: (parameter: Param) => Observable<Result>,
        options: CommandOptions = {},
        private readonly reportExecutionErrors = true,
    ) {
        const maxConcurrent = options.maxConcurrent ?? 1

        if (maxConcurrent < 1) {
            throw new RangeError('[rxvm] maxConcurrent must be at least 1')
        }

        this.maxConcurrent = maxConcurrent

        this.outputScheduler = options.outputScheduler ?? settings.mainScheduler
        this.exceptions = exceptionSubject(this.outputScheduler)

        const synchronizedInfo = this.executionInfo.pipe(observeOn(this.outputScheduler))

        const inFlight = synchronizedInfo.pipe(
            scan((count, info) => {
                if (info.type === 'begin') {
                    return count + 1
                }

                if (info.type === 'end') {
                    return count - 1
                }

                return count
            }, 0),
            startWith(0),
            shareReplay({ bufferSize: 1, refCount: true }),
        )

        this.isExecuting$ = inFlight.pipe(
            map((count) => count > 0),
            distinctUntilChanged(),
            shareReplay({ bufferSize: 1, refCount: true }),
        )

        const userCanExecute = (options.canExecute ?? of(true)).pipe(
            catchError((error: unknown) => {
                this.exceptions.next(error)
                return of(false)
            }),
            startWith(false),
        )

        this.canExecute$ = combineLatest([userCanExecute, inFlight]).pipe(
            map(([canExecute, count]) => canExecute && count < maxConcurrent),
            distinctUntilChanged(),
            shareReplay({ bufferSize: 1, refCount: true }),
        )

        this.results$ = synchronizedInfo.pipe(
            filter((info): info is { type: 'result'; value: Result } => info.type === 'result'),
            map((info) => info.value),
        )

        this.subscriptions.add(
            this.canExecute$.subscribe((value) => {
                this.latestCanExecute = value
            }),
        )
    }

    /** Whether an execution may start now. Replays the latest value. */
    get canExecute(): Observable<boolean> {
        return this.canExecute$
    }

    get isExecuting(): Observable<boolean> {
        return this.isExecuting$
    }

    /** Every execution's results. */
    get results(): Observable<Result> {
        return this.results$
    }

    get thrownExceptions(): Observable<unknown> {
        return this.exceptions.asObservable()
    }

    get canExecuteChanged(): Observable<boolean> {
        return this.canExecute$
    }

    subscribe(observer?: Partial<Observer<Result>> | ((value: Result) => void)): Subscription {
        return this.results$.subscribe(observer)
    }

    /**
     * Runs once when first subscribed; concurrent subscribers share the run
     * and late subscribers get its final result. Fails with
     * `COMMAND_CANNOT_EXECUTE` when the command cannot execute at that moment.
     */
    execute(parameter: Param): Observable<Result> {
        return defer(() => {
            if (!this.canStart()) {
                const refused = new RxvmError('Command cannot currently execute', 'COMMAND_CANNOT_EXECUTE')

                this.exceptions.next(refused)

                return throwError(() => refused)
            }

            return this.run(parameter)
        }).pipe(
            share({
                connector: () => new AsyncSubject<Result>(),
                resetOnError: false,
                resetOnComplete: false,
                resetOnRefCountZero: true,
            }),
            observeOn(this.outputScheduler),
        )
    }

    canExecuteNow(): boolean {
        return this.canStart()
    }

    /** Does nothing while the command cannot execute. */
    executeNow(parameter: Param): void {
        if (!this.canStart()) {
            return
        }

        // failures were already delivered to thrownExceptions
        this.execute(parameter)
            .pipe(catchError(() => EMPTY))
            .subscribe()
    }

    // the counter covers executions whose state changes are still queued on the output scheduler
    private canStart(): boolean {
        return this.latestCanExecute && this.running < this.maxConcurrent
    }

    private run(parameter: Param): Observable<Result> {
        this.running++
        this.executionInfo.next({ type: 'begin' })

        return defer(() => this.executeFn(parameter)).pipe(
            tap((value) => this.executionInfo.next({ type: 'result', value })),
            catchError((error: unknown) => {
                if (this.reportExecutionErrors) {
                    this.exceptions.next(error)
                }

                return throwError(() => error)
            }),
            finalize(() => {
                this.running--
                this.executionInfo.next({ type: 'end' })
            }),
        )
    }

    dispose(): void {
        this.subscriptions.unsubscribe()
        this.executionInfo.complete()
        this.exceptions.complete()
    }
}

export type AnyReactiveCommand = ReactiveCommand<never, unknown>

/**
 * Executes `command` with every value of `source` while the command can
 * execute; values arriving while it cannot are dropped.
 */
export function invokeCommand<T>(
    source: Observable<T>,
    command: ReactiveCommand<T, unknown> | BindableCommand<T>,
): Subscription {
    if (command instanceof ReactiveCommand) {
        return source
            .pipe(
                withLatestFrom(command.canExecute),
                filter(([, canExecute]) => canExecute),
                // failures were already delivered to thrownExceptions
                mergeMap(([value]) => command.execute(value).pipe(catchError(() => EMPTY))),
            )
            .subscribe()
    }

    return source.pipe(filter((value) => command.canExecuteNow(value))).subscribe((value) => command.executeNow(value))
}
