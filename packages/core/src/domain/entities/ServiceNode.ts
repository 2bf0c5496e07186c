/**
 * Registry entry for one service node
 */
export interface ServiceNodeState {
  /** Service node public key (hex) */
  readonly publicKey: string;
  /** Height at which the node registered */
  readonly registrationHeight: number;
  /** Height at which the stake unlocks (0 when no unlock is requested) */
  readonly requestedUnlockHeight: number;
  /** Height of the last block that rewarded this node */
  readonly lastRewardBlockHeight: number;
  /** Unix time of the last uptime proof */
  readonly lastUptimeProof: number;
  /** Whether the node is currently active */
  readonly active: boolean;
  /** Whether the node is fully staked */
  readonly funded: boolean;
  /** Required stake, in atomic units */
  readonly stakingRequirement: number;
  /** Stake contributed so far, in atomic units */
  readonly totalContributed: number;
  /** Operator wallet address */
  readonly operatorAddress: string;
}

/**
 * Create a ServiceNodeState from raw RPC data
 */
export function createServiceNodeState(data: {
  service_node_pubkey: string;
  registration_height: number;
  requested_unlock_height: number;
  last_reward_block_height: number;
  last_uptime_proof: number;
  active: boolean;
  funded: boolean;
  staking_requirement: number;
  total_contributed: number;
  operator_address: string;
}): ServiceNodeState {
  return {
    publicKey: data.service_node_pubkey,
    registrationHeight: data.registration_height,
    requestedUnlockHeight: data.requested_unlock_height,
    lastRewardBlockHeight: data.last_reward_block_height,
    lastUptimeProof: data.last_uptime_proof,
    active: data.active,
    funded: data.funded,
    stakingRequirement: data.staking_requirement,
    totalContributed: data.total_contributed,
    operatorAddress: data.operator_address,
  };
}
