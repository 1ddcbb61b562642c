export { EdgeListStore } from './edge-list-store'
export type { StoreStats } from './edge-list-store'
