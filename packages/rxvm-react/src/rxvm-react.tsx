import { useCallback, useEffect, useMemo, useSyncExternalStore } from 'react'
import { Observable } from 'rxjs'
import * as Rxvm from 'rxvm'

type ObservableStore<T> = {
    subscribe: (onStoreChange: () => void) => () => void
    getSnapshot: () => T
}

function createObservableStore<T>(source: Observable<T>, initialValue: T): ObservableStore<T> {
    let value = initialValue

    return {
        subscribe: (onStoreChange) => {
            const subscription = source.subscribe((next) => {
                value = next
                onStoreChange()
            })

            return () => subscription.unsubscribe()
        },
        getSnapshot: () => value,
    }
}

/**
 * The latest value of `source`, `initialValue` until it emits. Pass a stable
 * observable: a new one resubscribes.
 */
export function useObservableValue<T>(source: Observable<T>, initialValue: T): T {
    // the initial value only matters until the first emission
    const store = useMemo(() => createObservableStore(source, initialValue), [source])

    return useSyncExternalStore(store.subscribe, store.getSnapshot, store.getSnapshot)
}

/**
 * The current value of the property reached by `expression`, re-rendering
 * when it changes. `undefined` while a link of the chain is missing.
 */
export function useWhenAnyValue<Source, Value>(source: Source, expression: Rxvm.PropertyExpression<Source, Value>): Value | undefined {
    const chain = Rxvm.propertyChain(expression)
    const path = Rxvm.chainToString(chain)

    // the path identifies the expression across renders
    const store = useMemo(() => {
        const initialValue = Rxvm.getChainValue(source, chain).found ? expression(source) : undefined

        return createObservableStore<Value | undefined>(Rxvm.whenAnyValue(source, expression), initialValue)
    }, [source, path])

    return useSyncExternalStore(store.subscribe, store.getSnapshot, store.getSnapshot)
}

export type CommandState<Param> = {
    execute: (parameter: Param) => void
    canExecute: boolean
    isExecuting: boolean
}

export function useCommand<Param, Result>(command: Rxvm.ReactiveCommand<Param, Result>): CommandState<Param> {
    const canExecute = useObservableValue(command.canExecute, false)
    const isExecuting = useObservableValue(command.isExecuting, false)

    const execute = useCallback(
        (parameter: Param) => {
            command.executeNow(parameter)
        },
        [command],
    )

    return { execute, canExecute, isExecuting }
}

/**
 * Keeps `viewModel` activated while the calling component is mounted.
 */
export function useActivation(viewModel: Rxvm.ActivatableViewModel | undefined): void {
    useEffect(() => {
        if (!viewModel) {
            return
        }

        const activation = viewModel.activator.activate()

        return () => activation.unsubscribe()
    }, [viewModel])
}
