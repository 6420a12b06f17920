import { defer, Observable, observeOn, ReplaySubject, SchedulerLike, skip, Subscription } from 'rxjs'
import { logFor } from './logging'
import { ServiceKey, serviceKey } from './registry'
import { settings } from './settings'

/**
 * Identifies a message type on the bus. Keys are compared by identity, so
 * share one key per message type.
 */
export type MessageKey<T> = ServiceKey<T>

export const messageKey = <T>(description: string): MessageKey<T> => serviceKey<T>(description)

type Channel = {
    subject: ReplaySubject<unknown>
    hasValue: boolean
}

const DEFAULT_CONTRACT = '\u0000default'

// channels are stored erased; every channel is created for one MessageKey<T>
const typed = <T>(source: Observable<unknown>): Observable<T> => source as Observable<T>

/**
 * Loosely coupled publish/subscribe between view models. Each
 * `(key, contract)` pair is its own channel remembering the latest message.
 */
export class MessageBus {
    private static instance = new MessageBus()

    static get current(): MessageBus {
        return MessageBus.instance
    }

    static set current(bus: MessageBus) {
        MessageBus.instance = bus
    }

    private readonly channels = new Map<symbol, Map<string, Channel>>()
    private readonly schedulers = new Map<symbol, Map<string, SchedulerLike>>()

    /** Messages sent from now on. */
    listen<T>(key: MessageKey<T>, contract?: string): Observable<T> {
        return this.subscribeChannel(key, contract, false)
    }

    /** The latest message, if one was sent, then every new one. */
    listenIncludeLatest<T>(key: MessageKey<T>, contract?: string): Observable<T> {
        return this.subscribeChannel(key, contract, true)
    }

    isRegistered<T>(key: MessageKey<T>, contract?: string): boolean {
        return this.channels.get(key.id)?.has(contract ?? DEFAULT_CONTRACT) ?? false
    }

    /**
     * Forwards every value of `source` to the channel until the returned
     * subscription is closed. Neither completion nor failure of `source`
     * closes the channel; a failure is logged.
     */
    registerMessageSource<T>(key: MessageKey<T>, source: Observable<T>, contract?: string): Subscription {
        const channel = this.channel(key, contract)

        return source.subscribe({
            next: (message) => {
                channel.hasValue = true
                channel.subject.next(message)
            },
            error: (error: unknown) => {
                logFor(this).error(`Message source for ${key.description} failed`, error)
            },
        })
    }

    /** Messages of this channel are delivered on `scheduler`. */
    registerScheduler<T>(key: MessageKey<T>, scheduler: SchedulerLike, contract?: string): void {
        let byContract = this.schedulers.get(key.id)

        if (!byContract) {
            byContract = new Map()
            this.schedulers.set(key.id, byContract)
        }

        byContract.set(contract ?? DEFAULT_CONTRACT, scheduler)
    }

    sendMessage<T>(key: MessageKey<T>, message: T, contract?: string): void {
        const channel = this.channel(key, contract)

        channel.hasValue = true
        channel.subject.next(message)
    }

    private subscribeChannel<T>(key: MessageKey<T>, contract: string | undefined, includeLatest: boolean): Observable<T> {
        return defer(() => {
            const channel = this.channel(key, contract)
            const skipped = includeLatest || !channel.hasValue ? 0 : 1

            return typed<T>(channel.subject.pipe(skip(skipped), observeOn(this.schedulerFor(key, contract))))
        })
    }

    private schedulerFor<T>(key: MessageKey<T>, contract: string | undefined): SchedulerLike {
        return this.schedulers.get(key.id)?.get(contract ?? DEFAULT_CONTRACT) ?? settings.mainScheduler
    }

    private channel<T>(key: MessageKey<T>, contract: string | undefined): Channel {
        let byContract = this.channels.get(key.id)

        if (!byContract) {
            byContract = new Map()
            this.channels.set(key.id, byContract)
        }

        const name = contract ?? DEFAULT_CONTRACT
        let channel = byContract.get(name)

        if (!channel) {
            channel = { subject: new ReplaySubject<unknown>(1), hasValue: false }
            byContract.set(name, channel)
        }

        return channel
    }
}
