export { deserializeJson, serializeJson } from "./json.js";
