import { EventEmitter } from 'node:events'
import { combineLatest, fromEvent, isObservable, map, Observable, of, Subscription } from 'rxjs'
import {
    BindableCommand,
    BindingError,
    chainToString,
    isBindableCommand,
    Locator,
    logFor,
    pickByAffinity,
    PropertyExpression,
    propertyChain,
    serviceKey,
    subscribeToPropertyChain,
    typeKeyOf,
    typeName,
    ViewFor,
    ViewModelOf,
} from 'rxvm'
import { ReactiveBinding } from './property-binding'

/**
 * Connects a command to a control. `eventName` is set when the caller named
 * the event that should fire the command.
 */
export interface CommandBinder {
    getAffinityForObject(control: object, hasEventTarget: boolean): number
    bindCommandToObject(
        command: BindableCommand | undefined,
        control: object,
        commandParameter: Observable<unknown>,
        eventName?: string,
    ): Subscription
}

export const CommandBinderKey = serviceKey<CommandBinder>('CommandBinder')

export const DEFAULT_COMMAND_EVENT = 'click'

const supportsEvents = (control: object): control is EventTarget | EventEmitter => {
    return control instanceof EventTarget || control instanceof EventEmitter
}

/**
 * Fires the command from an event of a DOM-style `EventTarget` or a Node
 * `EventEmitter`; `click` when no event is named.
 */
export class EventCommandBinder implements CommandBinder {
    getAffinityForObject(control: object, hasEventTarget: boolean): number {
        if (!supportsEvents(control)) {
            return 0
        }

        return hasEventTarget ? 5 : 3
    }

    bindCommandToObject(
        command: BindableCommand | undefined,
        control: object,
        commandParameter: Observable<unknown>,
        eventName = DEFAULT_COMMAND_EVENT,
    ): Subscription {
        if (!command) {
            return new Subscription()
        }

        if (!supportsEvents(control)) {
            throw new BindingError(`${typeName(typeKeyOf(control))} has no events to bind ${eventName} to`)
        }

        let latestParameter: unknown
        const subscription = new Subscription()

        subscription.add(
            commandParameter.subscribe((parameter) => {
                latestParameter = parameter
            }),
        )

        // one call per branch so each picks its own fromEvent overload
        const events: Observable<unknown> =
            control instanceof EventTarget ? fromEvent(control, eventName) : fromEvent(control, eventName)

        subscription.add(
            events.subscribe(() => {
                if (command.canExecuteNow(latestParameter)) {
                    command.executeNow(latestParameter)
                }
            }),
        )

        return subscription
    }
}

type CommandHost = {
    command: unknown
    commandParameter?: unknown
}

const isCommandHost = (control: object): control is CommandHost => 'command' in control

/**
 * For controls that run a `command` themselves: assigns the command and keeps
 * `commandParameter` current. Closing the binding restores both values.
 */
export class CommandPropertyBinder implements CommandBinder {
    getAffinityForObject(control: object, hasEventTarget: boolean): number {
        return !hasEventTarget && isCommandHost(control) ? 5 : 0
    }

    bindCommandToObject(command: BindableCommand | undefined, control: object, commandParameter: Observable<unknown>): Subscription {
        if (!isCommandHost(control)) {
            throw new BindingError(`${typeName(typeKeyOf(control))} has no command property`)
        }

        const originalCommand = control.command
        const originalParameter = control.commandParameter
        const subscription = new Subscription()

        subscription.add(
            commandParameter.subscribe((parameter) => {
                control.commandParameter = parameter
            }),
        )
        control.command = command

        subscription.add(() => {
            control.command = originalCommand
            control.commandParameter = originalParameter
        })

        return subscription
    }
}

export const defaultCommandBinders = (): CommandBinder[] => [new EventCommandBinder(), new CommandPropertyBinder()]

let builtInBinders: CommandBinder[] | undefined

const commandBinders = (): CommandBinder[] => {
    const registered = Locator.current.getServices(CommandBinderKey)

    if (registered.length > 0) {
        return registered
    }

    if (!builtInBinders) {
        builtInBinders = defaultCommandBinders()
    }

    return builtInBinders
}

/**
 * Binds `command` to `control` with the binder that fits the control best.
 */
export function bindCommandToObject(
    command: BindableCommand | undefined,
    control: object,
    commandParameter: Observable<unknown>,
    eventName?: string,
): Subscription {
    const hasEventTarget = eventName !== undefined
    const binder = pickByAffinity(commandBinders(), (candidate) => candidate.getAffinityForObject(control, hasEventTarget))

    if (!binder) {
        throw new BindingError(`Couldn't find a command binder for ${typeName(typeKeyOf(control))}`)
    }

    return binder.bindCommandToObject(command, control, commandParameter, eventName)
}

export type BindCommandOptions<ViewModel> = {
    /** The parameter handed to the command: a view model property or a stream. */
    withParameter?: PropertyExpression<ViewModel, unknown> | Observable<unknown>
    /** Event of the control that fires the command. */
    toEvent?: string
}

const log = logFor('CommandBinder')

/**
 * Binds the command reached by `commandProperty` to the control reached by
 * `controlProperty`. The binding is rebuilt whenever either one changes.
 */
export function bindCommand<View extends ViewFor, Command extends BindableCommand | undefined, Control>(
    view: View,
    commandProperty: PropertyExpression<ViewModelOf<View>, Command>,
    controlProperty: PropertyExpression<View, Control>,
    options: BindCommandOptions<ViewModelOf<View>> = {},
): ReactiveBinding<View, unknown> {
    const { withParameter, toEvent } = options
    const viewModelPath = propertyChain(commandProperty)
    const controlPath = propertyChain(controlProperty)

    let parameters: Observable<unknown>

    if (withParameter === undefined) {
        parameters = of(undefined)
    } else if (isObservable(withParameter)) {
        parameters = withParameter
    } else {
        parameters = subscribeToPropertyChain<View, unknown>(view, ['viewModel', ...propertyChain(withParameter)], {
            skipInitial: false,
        }).pipe(map((change) => change.value))
    }

    const commands = subscribeToPropertyChain<View, unknown>(view, ['viewModel', ...viewModelPath], { skipInitial: false }).pipe(
        map((change) => change.value),
    )

    const controls = subscribeToPropertyChain<View, unknown>(view, controlPath, { skipInitial: false }).pipe(
        map((change) => change.value),
    )

    let current = new Subscription()

    const subscription = combineLatest([commands, controls]).subscribe(([command, control]) => {
        // keep the existing binding while the control is missing
        if (typeof control !== 'object' || control === null) {
            return
        }

        const bindable = isBindableCommand(command) ? command : undefined

        if (bindable === undefined && command !== undefined && command !== null) {
            log.error(`${chainToString(viewModelPath)} is not a command, nothing was bound`)
            return
        }

        current.unsubscribe()

        try {
            current = bindCommandToObject(bindable, control, parameters, toEvent)
        } catch (error) {
            current = new Subscription()
            log.error(`Failed to bind ${chainToString(viewModelPath)} to ${chainToString(controlPath)}`, error)
        }
    })

    subscription.add(() => current.unsubscribe())

    return new ReactiveBinding(view, controlPath, viewModelPath, commands, 'oneWay', subscription)
}
