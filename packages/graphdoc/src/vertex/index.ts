export { Vertex } from "./vertex"
