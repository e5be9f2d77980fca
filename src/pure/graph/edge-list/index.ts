export { parseEdgeList, formatMalformedInput } from './parseEdgeList'
export type { EdgeListEntry, EdgeListEdge, EdgeListNode, MalformedInput, ParsedEdgeList } from './parseEdgeList'
export { edgeListToDelta, edgeListToGraph, graphToEdgeList, toEdgeListToken } from './edgeListToGraph'
