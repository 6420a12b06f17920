import { Subscription } from 'rxjs'
import { ViewLocationError } from '../src/errors'
import { LoggerKey, MemoryLogger } from '../src/logging'
import { Locator, withResolver } from '../src/registry'
import { ViewFor } from '../src/view-for'
import {
    currentViewLocator,
    DefaultViewLocator,
    registerView,
    registerViewFor,
    requireView,
    ViewLocator,
    ViewLocatorKey,
} from '../src/view-locator'

class LoginViewModel {}
class AdminLoginViewModel extends LoginViewModel {}
class SettingsViewModel {}
class OrphanViewModel {}

class TestView implements ViewFor {
    viewModel: unknown = undefined

    constructor(readonly label: string) {}
}

const labelOf = (view: ViewFor | undefined) => (view instanceof TestView ? view.label : undefined)

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

describe('DefaultViewLocator', () => {
    it('should resolve a view registered for the view model type', () => {
        registerViewFor(LoginViewModel, () => new TestView('login'))

        expect(labelOf(new DefaultViewLocator().resolveView(new LoginViewModel()))).toBe('login')
    })

    it('should create a new view on every resolution', () => {
        registerViewFor(LoginViewModel, () => new TestView('login'))
        const locator = new DefaultViewLocator()

        expect(locator.resolveView(new LoginViewModel())).not.toBe(locator.resolveView(new LoginViewModel()))
    })

    it('should fall back to a view registered for a base type', () => {
        registerViewFor(LoginViewModel, () => new TestView('login'))

        expect(labelOf(new DefaultViewLocator().resolveView(new AdminLoginViewModel()))).toBe('login')
    })

    it('should prefer the most derived registration', () => {
        registerViewFor(LoginViewModel, () => new TestView('login'))
        registerViewFor(AdminLoginViewModel, () => new TestView('admin'))

        expect(labelOf(new DefaultViewLocator().resolveView(new AdminLoginViewModel()))).toBe('admin')
    })

    it('should find a view by name', () => {
        registerView('SettingsView', () => new TestView('settings'))

        expect(labelOf(new DefaultViewLocator().resolveView(new SettingsViewModel()))).toBe('settings')
    })

    it('should use a custom naming convention', () => {
        registerView('SettingsPage', () => new TestView('page'))
        const locator = new DefaultViewLocator((name) => name.replace(/ViewModel$/, 'Page'))

        expect(labelOf(locator.resolveView(new SettingsViewModel()))).toBe('page')
    })

    it('should honour contracts', () => {
        registerViewFor(LoginViewModel, () => new TestView('desktop'))
        registerViewFor(LoginViewModel, () => new TestView('mobile'), 'mobile')
        const locator = new DefaultViewLocator()

        expect(labelOf(locator.resolveView(new LoginViewModel()))).toBe('desktop')
        expect(labelOf(locator.resolveView(new LoginViewModel(), 'mobile'))).toBe('mobile')
    })

    it('should warn and return undefined when nothing matches', () => {
        expect(new DefaultViewLocator().resolveView(new OrphanViewModel())).toBeUndefined()
        expect(logger.messages('warn')).toEqual(["[DefaultViewLocator] Couldn't find a view for OrphanViewModel"])
    })
})

describe('view locator lookup', () => {
    it('should use the registered locator', () => {
        const custom: ViewLocator = { resolveView: () => new TestView('custom') }
        Locator.current.registerConstant(custom, ViewLocatorKey)

        expect(currentViewLocator()).toBe(custom)
        expect(labelOf(requireView(new OrphanViewModel()))).toBe('custom')
    })

    it('should throw from requireView when no view is found', () => {
        expect(() => requireView(new OrphanViewModel())).toThrow(ViewLocationError)
    })
})
