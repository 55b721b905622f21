// =============================================================================
// @stepweave/params - Public API
// =============================================================================

export {
  STATE_KEY,
  READ_ONLY_PARAMS,
  GLOBAL_BINDINGS,
  PARAM_BINDINGS,
  laneBindings,
  isParamKey,
  setParam,
  getParam,
  getState,
  applyState
} from './ParameterSurface'
export type { ApplyStateResult, ParamValue } from './ParameterSurface'

export { intCodec, enumCodec, onOffCodec, globalBinding, laneBinding } from './bindings'
export type { FieldCodec, ParamBinding } from './bindings'
