import { Subscription } from 'rxjs'
import { ServiceResolutionError } from '../src/errors'
import { DependencyResolver, Locator, requireService, serviceKey, withResolver } from '../src/registry'

interface Greeter {
    greet(name: string): string
}

const GreeterKey = serviceKey<Greeter>('Greeter')
const CounterKey = serviceKey<number>('Counter')

const greeter = (prefix: string): Greeter => ({
    greet: (name) => `${prefix} ${name}`,
})

describe('DependencyResolver', () => {
    it('should return undefined and an empty list when nothing is registered', () => {
        const resolver = new DependencyResolver()

        expect(resolver.getService(GreeterKey)).toBeUndefined()
        expect(resolver.getServices(GreeterKey)).toEqual([])
        expect(resolver.hasRegistration(GreeterKey)).toBe(false)
    })

    it('should resolve the last registration and list all of them in order', () => {
        const resolver = new DependencyResolver()

        resolver.registerConstant(greeter('Hello'), GreeterKey)
        resolver.registerConstant(greeter('Hi'), GreeterKey)

        expect(resolver.getService(GreeterKey)?.greet('Ada')).toBe('Hi Ada')
        expect(resolver.getServices(GreeterKey).map((g) => g.greet('Ada'))).toEqual(['Hello Ada', 'Hi Ada'])
    })

    it('should call a plain factory on every resolution', () => {
        const resolver = new DependencyResolver()
        let calls = 0

        resolver.register(() => ++calls, CounterKey)

        expect(resolver.getService(CounterKey)).toBe(1)
        expect(resolver.getService(CounterKey)).toBe(2)
    })

    it('should call a lazy singleton factory once, on first resolution', () => {
        const resolver = new DependencyResolver()
        const factory = jest.fn(() => 42)

        resolver.registerLazySingleton(factory, CounterKey)

        expect(factory).not.toHaveBeenCalled()
        expect(resolver.getService(CounterKey)).toBe(42)
        expect(resolver.getService(CounterKey)).toBe(42)
        expect(factory).toHaveBeenCalledTimes(1)
    })

    it('should keep contracts apart', () => {
        const resolver = new DependencyResolver()

        resolver.registerConstant(1, CounterKey)
        resolver.registerConstant(2, CounterKey, 'secondary')

        expect(resolver.getServices(CounterKey)).toEqual([1])
        expect(resolver.getServices(CounterKey, 'secondary')).toEqual([2])
        expect(resolver.hasRegistration(CounterKey, 'missing')).toBe(false)
    })

    it('should remove the most recent registration with unregisterCurrent', () => {
        const resolver = new DependencyResolver()

        resolver.registerConstant(1, CounterKey)
        resolver.registerConstant(2, CounterKey)
        resolver.unregisterCurrent(CounterKey)

        expect(resolver.getService(CounterKey)).toBe(1)
    })

    it('should ignore unregisterCurrent on an empty key', () => {
        const resolver = new DependencyResolver()

        expect(() => resolver.unregisterCurrent(CounterKey)).not.toThrow()
        expect(resolver.getServices(CounterKey)).toEqual([])
    })

    it('should remove everything with unregisterAll', () => {
        const resolver = new DependencyResolver()

        resolver.registerConstant(1, CounterKey)
        resolver.registerConstant(2, CounterKey)
        resolver.unregisterAll(CounterKey)

        expect(resolver.hasRegistration(CounterKey)).toBe(false)
    })

    it('should report existing and future registrations to a registration callback', () => {
        const resolver = new DependencyResolver()
        const callback = jest.fn()

        resolver.registerConstant(1, CounterKey)

        const subscription = resolver.serviceRegistrationCallback(CounterKey, callback)
        expect(callback).toHaveBeenCalledTimes(1)

        resolver.registerConstant(2, CounterKey)
        expect(callback).toHaveBeenCalledTimes(2)

        subscription.unsubscribe()
        resolver.registerConstant(3, CounterKey)
        expect(callback).toHaveBeenCalledTimes(2)
    })

    it('should let a callback stop itself through the subscription it receives', () => {
        const resolver = new DependencyResolver()
        const callback = jest.fn((subscription: Subscription) => subscription.unsubscribe())

        resolver.serviceRegistrationCallback(CounterKey, callback)
        resolver.registerConstant(1, CounterKey)
        resolver.registerConstant(2, CounterKey)

        expect(callback).toHaveBeenCalledTimes(1)
    })
})

describe('requireService', () => {
    it('should return the registered service', () => {
        const resolver = new DependencyResolver()
        resolver.registerConstant(7, CounterKey)

        expect(requireService(resolver, CounterKey)).toBe(7)
    })

    it('should throw a ServiceResolutionError naming the key and contract', () => {
        const resolver = new DependencyResolver()

        expect(() => requireService(resolver, GreeterKey, 'admin')).toThrow(ServiceResolutionError)
        expect(() => requireService(resolver, GreeterKey, 'admin')).toThrow(
            '[rxvm] No service registered for Greeter (contract: admin)',
        )
    })
})

describe('Locator', () => {
    it('should swap the current resolver with withResolver and restore it', () => {
        const original = Locator.current
        const scoped = new DependencyResolver()

        const subscription = withResolver(scoped)
        expect(Locator.current).toBe(scoped)

        subscription.unsubscribe()
        expect(Locator.current).toBe(original)
    })

    it('should notify resolver listeners immediately and on each change', () => {
        const listener = jest.fn()
        const subscription = Locator.onResolverChanged(listener)

        expect(listener).toHaveBeenCalledTimes(1)

        const scope = withResolver()
        expect(listener).toHaveBeenCalledTimes(2)

        scope.unsubscribe()
        expect(listener).toHaveBeenCalledTimes(3)

        subscription.unsubscribe()
        withResolver().unsubscribe()
        expect(listener).toHaveBeenCalledTimes(3)
    })
})
