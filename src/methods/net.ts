import { empty, string } from "./codecs.js";
import { defineMethod } from "./defineMethod.js";

/** The network id, as a decimal string. */
export const version = defineMethod({ name: "net_version", params: empty, result: string });
