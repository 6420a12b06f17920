import { defer, map, of, Subject } from 'rxjs'
import { DerivedProperty, toProperty } from '../src/derived-property'
import { whenAnyValue } from '../src/observe'
import { ReactiveObject } from '../src/reactive-object'

class CartViewModel extends ReactiveObject {
    private state = { quantity: 1, price: 10 }
    private readonly totalProperty: DerivedProperty<number>

    constructor() {
        super()

        this.totalProperty = toProperty(
            whenAnyValue(
                this,
                (vm) => vm.quantity,
                (vm) => vm.price,
            ).pipe(map(([quantity, price]) => quantity * price)),
            this,
            'total',
            { initialValue: 0 },
        )
    }

    get quantity() {
        return this.state.quantity
    }

    set quantity(value: number) {
        this.raiseAndSetIfChanged(this.state, 'quantity', value)
    }

    get price() {
        return this.state.price
    }

    set price(value: number) {
        this.raiseAndSetIfChanged(this.state, 'price', value)
    }

    get total() {
        return this.totalProperty.value
    }
}

describe('DerivedProperty', () => {
    it('should start with the initial value', () => {
        const source = new Subject<string>()
        const property = toProperty(source, undefined, 'title', { initialValue: 'untitled' })

        expect(property.value).toBe('untitled')
        expect(property.isSubscribed).toBe(true)
    })

    it('should follow the source', () => {
        const source = new Subject<string>()
        const property = toProperty(source, undefined, 'title', { initialValue: '' })

        source.next('Draft')

        expect(property.value).toBe('Draft')
    })

    it('should raise changing and changed on the owner for each new value', () => {
        const owner = new ReactiveObject()
        const source = new Subject<number>()
        const events: string[] = []
        const property = toProperty(source, owner, 'count', { initialValue: 0 })

        owner.changing.subscribe((event) => events.push(`changing:${event.propertyName}:${property.value}`))
        owner.changed.subscribe((event) => events.push(`changed:${event.propertyName}:${property.value}`))

        source.next(1)
        source.next(1)
        source.next(0)

        expect(events).toEqual(['changing:count:0', 'changed:count:1', 'changing:count:1', 'changed:count:0'])
    })

    it('should make a computed property observable on its owner', () => {
        const cart = new CartViewModel()
        const totals: number[] = []

        whenAnyValue(cart, (vm) => vm.total).subscribe((total) => totals.push(total))

        cart.quantity = 2
        cart.price = 10
        cart.price = 5

        expect(totals).toEqual([10, 20, 10])
    })

    it('should subscribe on the first read when deferred', () => {
        let subscriptions = 0
        const source = defer(() => {
            subscriptions++
            return of('ready')
        })

        const property = toProperty(source, undefined, 'status', { initialValue: 'idle', deferSubscription: true })

        expect(property.isSubscribed).toBe(false)
        expect(subscriptions).toBe(0)

        expect(property.value).toBe('ready')
        expect(property.value).toBe('ready')
        expect(property.isSubscribed).toBe(true)
        expect(subscriptions).toBe(1)
    })

    it('should report source errors through thrownExceptions', () => {
        const source = new Subject<number>()
        const property = toProperty(source, undefined, 'count', { initialValue: 0 })
        const thrown: unknown[] = []
        const failure = new Error('source failed')

        property.thrownExceptions.subscribe((error) => thrown.push(error))
        source.error(failure)

        expect(thrown).toEqual([failure])
        expect(property.value).toBe(0)
    })

    it('should stop following the source once disposed', () => {
        const source = new Subject<number>()
        const property = toProperty(source, undefined, 'count', { initialValue: 0 })

        property.dispose()
        source.next(5)

        expect(property.value).toBe(0)
        expect(property.isSubscribed).toBe(false)
    })
})
