import { RoutableViewModel, RoutingState, Screen } from '../src/routing'
import { whenAnyValue } from '../src/observe'

class AppScreen implements Screen {
    readonly router = new RoutingState()
}

class PageViewModel implements RoutableViewModel {
    constructor(
        readonly hostScreen: Screen,
        readonly urlPathSegment: string,
    ) {}
}

const segments = (stack: readonly RoutableViewModel[]) => stack.map((page) => page.urlPathSegment)

describe('RoutingState', () => {
    it('should push pages with navigate', () => {
        const screen = new AppScreen()
        const results: RoutableViewModel[] = []
        const home = new PageViewModel(screen, 'home')
        const details = new PageViewModel(screen, 'details')

        screen.router.navigate.execute(home).subscribe((page) => results.push(page))
        screen.router.navigate.execute(details).subscribe()

        expect(results).toEqual([home])
        expect(segments(screen.router.navigationStack)).toEqual(['home', 'details'])
        expect(screen.router.getCurrentViewModel()).toBe(details)
    })

    it('should go back only when there is somewhere to go', () => {
        const screen = new AppScreen()
        const canGoBack: boolean[] = []

        screen.router.navigateBack.canExecute.subscribe((value) => canGoBack.push(value))

        screen.router.navigate.execute(new PageViewModel(screen, 'home')).subscribe()
        screen.router.navigate.execute(new PageViewModel(screen, 'details')).subscribe()
        screen.router.navigateBack.execute().subscribe()

        expect(canGoBack).toEqual([false, true, false])
        expect(segments(screen.router.navigationStack)).toEqual(['home'])
    })

    it('should return the new current page from navigateBack', () => {
        const screen = new AppScreen()
        const home = new PageViewModel(screen, 'home')
        const results: Array<RoutableViewModel | undefined> = []

        screen.router.navigate.execute(home).subscribe()
        screen.router.navigate.execute(new PageViewModel(screen, 'details')).subscribe()
        screen.router.navigateBack.execute().subscribe((page) => results.push(page))

        expect(results).toEqual([home])
    })

    it('should replace the whole stack with navigateAndReset', () => {
        const screen = new AppScreen()

        screen.router.navigate.execute(new PageViewModel(screen, 'home')).subscribe()
        screen.router.navigate.execute(new PageViewModel(screen, 'details')).subscribe()
        screen.router.navigateAndReset.execute(new PageViewModel(screen, 'login')).subscribe()

        expect(segments(screen.router.navigationStack)).toEqual(['login'])
    })

    it('should publish the current page and the stack', () => {
        const screen = new AppScreen()
        const current: Array<string | undefined> = []
        const sizes: number[] = []

        screen.router.currentViewModel.subscribe((page) => current.push(page?.urlPathSegment))
        screen.router.navigationChanged.subscribe((stack) => sizes.push(stack.length))

        screen.router.navigate.execute(new PageViewModel(screen, 'home')).subscribe()
        screen.router.clear()

        expect(current).toEqual([undefined, 'home', undefined])
        expect(sizes).toEqual([0, 1, 0])
    })

    it('should raise a change notification for the navigation stack', () => {
        const screen = new AppScreen()
        const sizes: number[] = []

        whenAnyValue(screen.router, (router) => router.navigationStack).subscribe((stack) => sizes.push(stack.length))
        screen.router.navigate.execute(new PageViewModel(screen, 'home')).subscribe()

        expect(sizes).toEqual([0, 1])
    })
})
