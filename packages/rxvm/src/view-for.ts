/**
 * A view that hosts a view model. Bindings and activation read and observe
 * `viewModel`, so views should raise change notifications for it.
 */
export interface ViewFor<ViewModel = unknown> {
    viewModel: ViewModel | undefined
}

export type ViewModelOf<View extends ViewFor> = NonNullable<View['viewModel']>

export const isViewFor = (value: unknown): value is ViewFor => {
    return typeof value === 'object' && value !== null && 'viewModel' in value
}
