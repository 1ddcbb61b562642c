export { Path } from './path'
export type { TraversalView } from './path'
