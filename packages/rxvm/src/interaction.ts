import { concat, concatMap, defer, EMPTY, from, ignoreElements, Observable, of, Subscription, throwError } from 'rxjs'
import { RxvmError, UnhandledInteractionError } from './errors'

export class InteractionContext<Input, Output> {
    private output: { value: Output } | undefined

    constructor(readonly input: Input) {}

    get isHandled(): boolean {
        return this.output !== undefined
    }

    setOutput(value: Output): void {
        if (this.output) {
            throw new RxvmError('Output has already been set for this interaction', 'INTERACTION_OUTPUT_SET')
        }

        this.output = { value }
    }

    getOutput(): Output {
        if (!this.output) {
            throw new RxvmError('Output has not been set for this interaction', 'INTERACTION_OUTPUT_MISSING')
        }

        return this.output.value
    }
}

export type InteractionHandler<Input, Output> = (
    context: InteractionContext<Input, Output>,
) => void | Promise<void> | Observable<unknown>

const completionOf = (result: void | Promise<void> | Observable<unknown>): Observable<never> => {
    if (result instanceof Observable || result instanceof Promise) {
        return from(result).pipe(ignoreElements())
    }

    return EMPTY
}

/**
 * Lets a view model ask its view (or a test) for input. Handlers run newest
 * first, each waiting for the previous one to finish, until one sets the output.
 *
 * ```ts
 * const confirmDelete = new Interaction<string, boolean>()
 *
 * view.subscriptions.add(
 *     confirmDelete.registerHandler((context) => context.setOutput(window.confirm(context.input))),
 * )
 * ```
 */
export class Interaction<Input, Output> {
    private readonly handlers: Array<InteractionHandler<Input, Output>> = []

    registerHandler(handler: InteractionHandler<Input, Output>): Subscription {
        this.handlers.push(handler)

        return new Subscription(() => {
            const index = this.handlers.indexOf(handler)

            if (index !== -1) {
                this.handlers.splice(index, 1)
            }
        })
    }

    /**
     * Cold: handlers run once per subscription.
     */
    handle(input: Input): Observable<Output> {
        return defer(() => {
            const context = new InteractionContext<Input, Output>(input)
            const handlers = [...this.handlers].reverse()

            const run = from(handlers).pipe(
                concatMap((handler) => (context.isHandled ? EMPTY : defer(() => completionOf(handler(context))))),
            )

            const result = defer(() =>
                context.isHandled
                    ? of(context.getOutput())
                    : throwError(() => new UnhandledInteractionError<Input>(input)),
            )

            return concat(run, result)
        })
    }
}
