export { Edge } from "./edge"
export { anchorView } from "./view"
export type { EdgeView, PlaceLookup } from "./view"
