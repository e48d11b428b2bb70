export { createTransport } from "./createTransport.js";
export {
  custom,
  type CustomProvider,
  type CustomTransport,
  type CustomTransportConfig,
} from "./custom.js";
export { http, type HttpTransport, type HttpTransportConfig } from "./http.js";
