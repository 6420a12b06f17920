import { RegistrationModule } from 'rxvm'
import { CommandBinderKey, CommandPropertyBinder, EventCommandBinder } from './command-binding'
import { ConverterServiceKey, createDefaultConverterService } from './converters'

/**
 * Registers the converter service and the command binders:
 *
 * ```ts
 * new RxvmBuilder().withCoreServices().withModule(bindingModule).build()
 * ```
 */
export const bindingModule: RegistrationModule = (registry) => {
    registry.registerLazySingleton(createDefaultConverterService, ConverterServiceKey)
    registry.registerConstant(new EventCommandBinder(), CommandBinderKey)
    registry.registerConstant(new CommandPropertyBinder(), CommandBinderKey)
}
