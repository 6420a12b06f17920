import { DependencyResolver, RxvmBuilder } from 'rxvm'
import { bindingModule } from '../src/binding-module'
import { CommandBinderKey, CommandPropertyBinder, EventCommandBinder } from '../src/command-binding'
import { ConverterService, ConverterServiceKey, ok } from '../src/converters'

describe('bindingModule', () => {
    it('should register the command binders in order', () => {
        const registry = new RxvmBuilder().withModule(bindingModule).buildInto(new DependencyResolver())
        const binders = registry.getServices(CommandBinderKey)

        expect(binders).toHaveLength(2)
        expect(binders[0]).toBeInstanceOf(EventCommandBinder)
        expect(binders[1]).toBeInstanceOf(CommandPropertyBinder)
    })

    it('should register one shared converter service', () => {
        const registry = new RxvmBuilder().withModule(bindingModule).buildInto(new DependencyResolver())
        const service = registry.getService(ConverterServiceKey)

        expect(service).toBeInstanceOf(ConverterService)
        expect(registry.getService(ConverterServiceKey)).toBe(service)
        expect(service?.convert(3, String)).toEqual(ok('3'))
    })
})
