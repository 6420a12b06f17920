import { mkdir, readFile, rm, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import {
    catchError,
    defer,
    EMPTY,
    finalize,
    from,
    mergeMap,
    Observable,
    of,
    ReplaySubject,
    Subscription,
    switchAll,
    throwError,
} from 'rxjs'
import { RxvmError } from './errors'
import { logFor } from './logging'
import { ReactiveObject } from './reactive-object'

/**
 * Loads and saves the application state between runs.
 */
export interface SuspensionDriver<AppState = unknown> {
    /** Emits the saved state, or `undefined` when nothing was saved, then completes. */
    loadState(): Observable<AppState | undefined>
    saveState(state: AppState): Observable<void>
    invalidateState(): Observable<void>
}

const notSetUp = (stream: string) =>
    throwError(() => new RxvmError(`The host application has not provided the ${stream} stream of the suspension host`))

/**
 * The application's lifecycle as streams, plus the state object that
 * survives suspension. The host application sets the lifecycle streams;
 * reading one that was never set fails.
 */
export class SuspensionHost<AppState = unknown> extends ReactiveObject {
    private readonly isLaunchingNewSource = new ReplaySubject<Observable<void>>(1)
    private readonly isResumingSource = new ReplaySubject<Observable<void>>(1)
    private readonly isUnpausingSource = new ReplaySubject<Observable<void>>(1)
    private readonly shouldPersistStateSource = new ReplaySubject<Observable<Subscription>>(1)
    private readonly shouldInvalidateStateSource = new ReplaySubject<Observable<void>>(1)
    private state: { appState: AppState | undefined } = { appState: undefined }

    createNewAppState?: () => AppState

    constructor() {
        super()

        this.isLaunchingNewSource.next(notSetUp('isLaunchingNew'))
        this.isResumingSource.next(notSetUp('isResuming'))
        this.isUnpausingSource.next(notSetUp('isUnpausing'))
        this.shouldPersistStateSource.next(notSetUp('shouldPersistState'))
        this.shouldInvalidateStateSource.next(notSetUp('shouldInvalidateState'))
    }

    /** The application starts without saved state. */
    get isLaunchingNew(): Observable<void> {
        return this.isLaunchingNewSource.pipe(switchAll())
    }

    set isLaunchingNew(source: Observable<void>) {
        this.isLaunchingNewSource.next(source)
    }

    /** The application restarts after it was terminated in the background. */
    get isResuming(): Observable<void> {
        return this.isResumingSource.pipe(switchAll())
    }

    set isResuming(source: Observable<void>) {
        this.isResumingSource.next(source)
    }

    /** The application returns to the foreground without having been terminated. */
    get isUnpausing(): Observable<void> {
        return this.isUnpausingSource.pipe(switchAll())
    }

    set isUnpausing(source: Observable<void>) {
        this.isUnpausingSource.next(source)
    }

    /**
     * The state must be saved now. Each value is a handle the host closes
     * once saving is done.
     */
    get shouldPersistState(): Observable<Subscription> {
        return this.shouldPersistStateSource.pipe(switchAll())
    }

    set shouldPersistState(source: Observable<Subscription>) {
        this.shouldPersistStateSource.next(source)
    }

    /** The saved state is no longer trustworthy, e.g. after a crash. */
    get shouldInvalidateState(): Observable<void> {
        return this.shouldInvalidateStateSource.pipe(switchAll())
    }

    set shouldInvalidateState(source: Observable<void>) {
        this.shouldInvalidateStateSource.next(source)
    }

    get appState(): AppState | undefined {
        return this.state.appState
    }

    set appState(value: AppState | undefined) {
        this.raiseAndSetIfChanged(this.state, 'appState', value)
    }

    /** The current state, created with `createNewAppState` when there is none. */
    getAppState(): AppState | undefined {
        if (this.appState === undefined && this.createNewAppState) {
            this.appState = this.createNewAppState()
        }

        return this.appState
    }

    dispose(): void {
        this.isLaunchingNewSource.complete()
        this.isResumingSource.complete()
        this.isUnpausingSource.complete()
        this.shouldPersistStateSource.complete()
        this.shouldInvalidateStateSource.complete()
    }
}

let defaultHost: SuspensionHost | undefined

export function currentSuspensionHost(): SuspensionHost {
    if (!defaultHost) {
        defaultHost = new SuspensionHost()
    }

    return defaultHost
}

/**
 * Wires `host` to `driver`: saved state is loaded on resume, replaced on a
 * fresh launch, saved when the host asks and discarded when it is
 * invalidated. A failing driver call is logged and the lifecycle stream
 * keeps going.
 */
export function setupDefaultSuspendResume<AppState>(
    host: SuspensionHost<AppState>,
    driver: SuspensionDriver<AppState>,
): Subscription {
    const log = logFor(host)
    const subscriptions = new Subscription()
    const streamFailed = (error: unknown) => log.error('A suspension lifecycle stream failed', error)

    subscriptions.add(
        host.shouldInvalidateState
            .pipe(
                mergeMap(() =>
                    driver.invalidateState().pipe(
                        catchError((error: unknown) => {
                            log.warn('Tried to invalidate app state', error)
                            return EMPTY
                        }),
                    ),
                ),
            )
            .subscribe({ next: () => log.info('Invalidated app state'), error: streamFailed }),
    )

    subscriptions.add(
        host.shouldPersistState
            .pipe(
                mergeMap((done) =>
                    defer(() => {
                        const state = host.appState

                        return state === undefined ? of(undefined) : driver.saveState(state)
                    }).pipe(
                        catchError((error: unknown) => {
                            log.warn('Tried to persist app state', error)
                            return EMPTY
                        }),
                        finalize(() => done.unsubscribe()),
                    ),
                ),
            )
            .subscribe({ next: () => log.info('Persisted app state'), error: streamFailed }),
    )

    subscriptions.add(
        host.isResuming
            .pipe(
                mergeMap(() =>
                    driver.loadState().pipe(
                        catchError((error: unknown) => {
                            log.warn('Failed to restore app state from storage, creating from scratch', error)
                            return of(undefined)
                        }),
                    ),
                ),
            )
            .subscribe({
                next: (loaded) => {
                    host.appState = loaded ?? host.createNewAppState?.()
                },
                error: streamFailed,
            }),
    )

    subscriptions.add(
        host.isLaunchingNew.subscribe({
            next: () => {
                host.appState = host.createNewAppState?.()
            },
            error: streamFailed,
        }),
    )

    return subscriptions
}

/**
 * Keeps the state in memory; survives nothing but is handy in tests and
 * short-lived hosts.
 */
export class MemorySuspensionDriver<AppState> implements SuspensionDriver<AppState> {
    private saved: { state: AppState } | undefined

    constructor(initialState?: AppState) {
        if (initialState !== undefined) {
            this.saved = { state: initialState }
        }
    }

    loadState(): Observable<AppState | undefined> {
        return defer(() => of(this.saved?.state))
    }

    saveState(state: AppState): Observable<void> {
        return defer(() => {
            this.saved = { state }
            return of(undefined)
        })
    }

    invalidateState(): Observable<void> {
        return defer(() => {
            this.saved = undefined
            return of(undefined)
        })
    }
}

const isMissingFile = (error: unknown): boolean => {
    return typeof error === 'object' && error !== null && Reflect.get(error, 'code') === 'ENOENT'
}

/**
 * Stores the state as JSON in one file. `parse` turns the decoded JSON back
 * into a state object and should reject anything it doesn't recognize.
 */
export class JsonFileSuspensionDriver<AppState> implements SuspensionDriver<AppState> {
    private readonly log = logFor(this)

    constructor(
        readonly filePath: string,
        private readonly parse: (raw: unknown) => AppState,
    ) {}

    loadState(): Observable<AppState | undefined> {
        return defer(() => from(this.read()))
    }

    saveState(state: AppState): Observable<void> {
        return defer(() => from(this.write(state)))
    }

    invalidateState(): Observable<void> {
        return defer(() => from(rm(this.filePath, { force: true })))
    }

    private async read(): Promise<AppState | undefined> {
        let text: string

        try {
            text = await readFile(this.filePath, 'utf8')
        } catch (error) {
            if (isMissingFile(error)) {
                this.log.debug(`No saved state at ${this.filePath}`)
                return undefined
            }

            throw error
        }

        const raw: unknown = JSON.parse(text)

        return this.parse(raw)
    }

    private async write(state: AppState): Promise<void> {
        await mkdir(dirname(this.filePath), { recursive: true })
        await writeFile(this.filePath, JSON.stringify(state, null, 2), 'utf8')
    }
}
