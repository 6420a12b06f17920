import { EventEmitter } from 'node:events'
import { BehaviorSubject, Observable, Subject, Subscription } from 'rxjs'
import { MemoryLogger, LoggerKey } from '../src/logging'
import {
    ObservableForPropertyKey,
    ObservableForPropertyProvider,
    observableForProperty,
    PROPERTY_CHANGED_EVENT,
    whenAny,
    whenAnyObservable,
    whenAnyValue,
} from '../src/observe'
import { ReactiveObject } from '../src/reactive-object'
import { Locator, withResolver } from '../src/registry'

class AddressViewModel extends ReactiveObject {
    private state = { city: '' }

    constructor(city: string) {
        super()
        this.state.city = city
    }

    get city() {
        return this.state.city
    }

    set city(value: string) {
        this.raiseAndSetIfChanged(this.state, 'city', value)
    }
}

class PersonViewModel extends ReactiveObject {
    private state: {
        name: string
        age: number
        address: AddressViewModel | undefined
        messages: Observable<string> | undefined
    } = { name: '', age: 0, address: undefined, messages: undefined }

    get name() {
        return this.state.name
    }

    set name(value: string) {
        this.raiseAndSetIfChanged(this.state, 'name', value)
    }

    get age() {
        return this.state.age
    }

    set age(value: number) {
        this.raiseAndSetIfChanged(this.state, 'age', value)
    }

    get address() {
        return this.state.address
    }

    set address(value: AddressViewModel | undefined) {
        this.raiseAndSetIfChanged(this.state, 'address', value)
    }

    get messages() {
        return this.state.messages
    }

    set messages(value: Observable<string> | undefined) {
        this.raiseAndSetIfChanged(this.state, 'messages', value)
    }
}

class Thermometer extends EventEmitter {
    private current = 20

    get temperature() {
        return this.current
    }

    set temperature(value: number) {
        this.current = value
        this.emit(PROPERTY_CHANGED_EVENT, 'temperature')
    }
}

let scope: Subscription
let logger: MemoryLogger

beforeEach(() => {
    scope = withResolver()
    logger = new MemoryLogger()
    Locator.current.registerConstant(logger, LoggerKey)
})

afterEach(() => {
    scope.unsubscribe()
})

describe('whenAnyValue', () => {
    it('should emit the current value and then every change', () => {
        const person = new PersonViewModel()
        const names: string[] = []

        whenAnyValue(person, (p) => p.name).subscribe((name) => names.push(name))

        person.name = 'Ada'
        person.name = 'Grace'

        expect(names).toEqual(['', 'Ada', 'Grace'])
    })

    it('should follow a chain across replaced intermediate objects', () => {
        const person = new PersonViewModel()
        const first = new AddressViewModel('Oslo')
        const second = new AddressViewModel('Lima')
        const cities: string[] = []

        person.address = first
        whenAnyValue(person, (p) => p.address?.city).subscribe((city) => cities.push(city ?? 'none'))

        first.city = 'Bergen'
        person.address = second
        first.city = 'Tromso'
        second.city = 'Cusco'

        expect(cities).toEqual(['Oslo', 'Bergen', 'Lima', 'Cusco'])
    })

    it('should emit nothing while an intermediate link is missing', () => {
        const person = new PersonViewModel()
        const cities: Array<string | undefined> = []

        whenAnyValue(person, (p) => p.address?.city).subscribe((city) => cities.push(city))

        expect(cities).toEqual([])

        person.address = new AddressViewModel('Quito')

        expect(cities).toEqual(['Quito'])
    })

    it('should combine several properties into tuples', () => {
        const person = new PersonViewModel()
        const values: Array<[string, number]> = []

        whenAnyValue(
            person,
            (p) => p.name,
            (p) => p.age,
        ).subscribe((value) => values.push(value))

        person.name = 'Ada'
        person.age = 36

        expect(values).toEqual([
            ['', 0],
            ['Ada', 0],
            ['Ada', 36],
        ])
    })

    it('should observe event emitters announcing their changes', () => {
        const thermometer = new Thermometer()
        const readings: number[] = []

        whenAnyValue(thermometer, (t) => t.temperature).subscribe((value) => readings.push(value))

        thermometer.temperature = 25
        thermometer.emit(PROPERTY_CHANGED_EVENT, 'unrelated')

        expect(readings).toEqual([20, 25])
    })

    it('should report the current value of a plain object once and warn about it', () => {
        const totals = { total: 3 }
        const values: number[] = []

        whenAnyValue(totals, (t) => t.total).subscribe((value) => values.push(value))
        totals.total = 4

        expect(values).toEqual([3])
        expect(logger.messages('warn')).toEqual([
            '[PlainObjectObservableForProperty] Object.total is a plain property; changes to it will not be observed',
        ])
    })

    it('should fail when no registered observer accepts the property', () => {
        const useless: ObservableForPropertyProvider = {
            getAffinityForObject: () => 0,
            getNotificationForProperty: () => new Subject<unknown>(),
        }
        Locator.current.registerConstant(useless, ObservableForPropertyKey)

        const errors: unknown[] = []
        whenAnyValue({ count: 1 }, (o) => o.count).subscribe({ error: (error: unknown) => errors.push(error) })

        expect(errors).toHaveLength(1)
        expect(errors[0]).toBeInstanceOf(Error)
        expect(String(errors[0])).toBe(
            'RxvmError: [rxvm] Could not find an ObservableForPropertyProvider for Object.count; the service registry is probably misconfigured',
        )
    })
})

describe('observableForProperty', () => {
    it('should skip the current value by default', () => {
        const person = new PersonViewModel()
        const changes: Array<{ path: readonly string[]; value: number }> = []

        observableForProperty(person, (p) => p.age).subscribe(({ path, value }) => changes.push({ path, value }))

        person.age = 1
        person.age = 2

        expect(changes).toEqual([
            { path: ['age'], value: 1 },
            { path: ['age'], value: 2 },
        ])
    })

    it('should report the previous value before each change', () => {
        const person = new PersonViewModel()
        person.name = 'a'
        const values: string[] = []

        observableForProperty(person, (p) => p.name, { beforeChange: true }).subscribe((change) => values.push(change.value))

        person.name = 'b'
        person.name = 'c'

        expect(values).toEqual(['a', 'b'])
    })

    it('should carry the observed object as sender', () => {
        const person = new PersonViewModel()
        const senders: unknown[] = []

        observableForProperty(person, (p) => p.name).subscribe((change) => senders.push(change.sender))
        person.name = 'x'

        expect(senders).toEqual([person])
    })

    it('should repeat identical values when distinct is off', () => {
        const person = new PersonViewModel()
        const values: string[] = []

        observableForProperty(person, (p) => p.name, { distinct: false }).subscribe((change) => values.push(change.value))

        person.name = 'x'
        person.raisePropertyChanged('name')

        expect(values).toEqual(['x', 'x'])
    })
})

describe('whenAny', () => {
    it('should apply the selector to the latest changes', () => {
        const person = new PersonViewModel()
        const labels: string[] = []

        whenAny(person, [(p) => p.name, (p) => p.age], (name, age) => `${name.value}:${age.value}`).subscribe((label) =>
            labels.push(label),
        )

        person.name = 'Ada'

        expect(labels).toEqual([':0', 'Ada:0'])
    })
})

describe('whenAnyObservable', () => {
    it('should switch to the observable currently held by the property', () => {
        const person = new PersonViewModel()
        const first = new BehaviorSubject('first-1')
        const second = new Subject<string>()
        const received: string[] = []

        whenAnyObservable(person, (p) => p.messages).subscribe((message) => received.push(message))

        person.messages = first
        first.next('first-2')
        person.messages = second
        first.next('first-3')
        second.next('second-1')
        person.messages = undefined
        second.next('second-2')

        expect(received).toEqual(['first-1', 'first-2', 'second-1'])
    })
})
