export { DepTree } from './dep-tree.js'
export { EdgeIndex } from './edge-index.js'
export { TargetStore } from './target-store.js'
export { reduceTransitively } from './transitive-reduction.js'
export { illegalTransition, nextState } from './lifecycle.js'
export type {
  TargetHandle,
  TargetState,
  TargetRecord,
  LifecycleOperation,
  ReadinessMode,
  DepTreeOptions,
  TreeSummary,
} from './types.js'
