/**
 * @quarry/gateway-client
 *
 * ProviderSession adapter for the Client Portal gateway REST API
 */

export { GatewayRestClient, GatewayHttpError, type GatewayRequestOptions } from './rest/client';
export * from './rest/gateway-schemas';
export {
  GatewaySession,
  INDEX_EXCHANGE_PREFERENCES,
  selectContract,
  type GatewaySessionOptions,
} from './session/gateway-session';
export { GATEWAY_BAR_PARAMS, toGatewayBar, buildHistoryQuery, formatBarDate } from './session/bar-params';
