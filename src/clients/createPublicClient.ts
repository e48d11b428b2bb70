import type { Chain } from "viem";
import { type PublicActions, publicActions } from "../actions/publicActions.js";
import type { Client, ClientConfig, Transport } from "../types/index.js";
import { createClient } from "./createClient.js";

export type PublicClient<chain extends Chain | undefined = Chain | undefined> = Client<chain> &
  PublicActions;

/**
 * Creates a client with the read-only Ethereum actions attached.
 *
 * @example
 * const client = createPublicClient({ chain: mainnet, transport: http() });
 * const blockNumber = await client.getBlockNumber();
 */
export function createPublicClient<
  transport extends Transport = Transport,
  chain extends Chain | undefined = undefined,
>(parameters: ClientConfig<transport, chain>): PublicClient<chain> {
  const { name = "Public Client", ...rest } = parameters;
  const client = createClient({ ...rest, name });
  return Object.assign(client, publicActions(client));
}
