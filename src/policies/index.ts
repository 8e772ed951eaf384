import type { Policy } from "./policy";
import { fewestTilesPolicy, humanLikePolicy, minScorePolicy, randomPolicy } from "./basicPolicies";

export type { Policy } from "./policy";
export { fewestTilesPolicy, humanLikePolicy, minScorePolicy, randomPolicy } from "./basicPolicies";
export { loadTablePolicy, snapshotKey, tablePolicy, writePolicyTable } from "./tablePolicy";
export type { PolicyTable } from "./tablePolicy";

export const POLICIES = {
  random: randomPolicy,
  fewest: fewestTilesPolicy,
  minscore: minScorePolicy,
  human: humanLikePolicy,
} as const satisfies Record<string, Policy>;

export type PolicyName = keyof typeof POLICIES;

export function isPolicyName(name: string): name is PolicyName {
  return Object.prototype.hasOwnProperty.call(POLICIES, name);
}
