export * from './types';
export { HttpAlertGateway, jsmBaseUrl, truncate } from './http.gateway';
