export { shortestPath } from './shortest-path'
export type { SearchableGraph } from './shortest-path'
