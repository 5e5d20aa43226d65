declare module "ssrf-req-filter" {
  import type { Agent } from "node:http";

  /**
   * HTTP(S) agent for `url` that refuses connections to private and
   * reserved addresses.
   */
  export default function ssrfFilter(url: string): Agent;
}
