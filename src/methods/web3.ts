import { empty, string } from "./codecs.js";
import { defineMethod } from "./defineMethod.js";

export const clientVersion = defineMethod({
  name: "web3_clientVersion",
  params: empty,
  result: string,
});
