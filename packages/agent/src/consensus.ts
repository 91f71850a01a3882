import { isWithinRange } from '@swarmgrid/core';
import type {
  BeliefChange,
  Claim,
  ClaimBucket,
  CommunicationLink,
  ConsensusParticipant,
  ConsensusRoundReport,
  VoteRecord,
  VoteResult,
} from './types.js';

export interface ConsensusOptions {
  /** Manhattan radius within which two participants exchange claims. */
  readonly communicationRange: number;
  /** Claims within this distance of a bucket's seed count for that bucket. */
  readonly tolerance: number;
  /** Votes a winning bucket needs before any belief changes. */
  readonly quorum: number;
}

interface MutableBucket {
  readonly position: ClaimBucket['position'];
  readonly reporters: number[];
}

/**
 * Group claims into buckets. Each claim joins the first bucket whose seed
 * lies within `tolerance` of it, or seeds a new one.
 *
 * @returns Buckets ordered by vote count, largest first; equal counts keep seed order.
 */
export function bucketClaims(claims: readonly Claim[], tolerance: number): ClaimBucket[] {
  const buckets: MutableBucket[] = [];
  for (const claim of claims) {
    const bucket = buckets.find((candidate) => isWithinRange(candidate.position, claim.position, tolerance));
    if (bucket === undefined) {
      buckets.push({ position: claim.position, reporters: [claim.reporterId] });
    } else {
      bucket.reporters.push(claim.reporterId);
    }
  }
  return buckets
    .map((bucket) => ({
      position: bucket.position,
      votes: bucket.reporters.length,
      reporters: Object.freeze([...bucket.reporters]),
    }))
    .sort((a, b) => b.votes - a.votes);
}

/**
 * Majority-vote one receiver's claims for one target.
 *
 * The top bucket wins only with strictly more votes than the runner-up and
 * at least `quorum` votes. A tie or a thin top bucket decides nothing.
 *
 * @param selfId - The receiver; its own claim is one ordinary vote.
 *
 * @example
 * ```typescript
 * const result = tallyVotes(0, [self, honestPeer, liar], 1, 2, 3);
 * result.decision; // 'winner' when self and honestPeer agree within 1 cell
 * ```
 */
export function tallyVotes(
  targetId: number,
  claims: readonly Claim[],
  tolerance: number,
  quorum: number,
  selfId: number,
): VoteResult {
  const buckets = bucketClaims(claims, tolerance);
  const [top, runnerUp] = buckets;
  let decision: VoteResult['decision'] = 'winner';
  if (top === undefined || top.votes < quorum) {
    decision = 'no-quorum';
  }
  if (top !== undefined && runnerUp !== undefined && runnerUp.votes === top.votes) {
    decision = 'tie';
  }
  const winner = decision === 'winner' && top !== undefined ? top : null;
  return Object.freeze({
    targetId,
    decision,
    winner,
    buckets: Object.freeze(buckets),
    includesSelf: winner !== null && winner.reporters.includes(selfId),
  });
}

/**
 * Pairwise claim exchange plus per-receiver majority filtering.
 *
 * Participants are opaque: the engine never asks who is Byzantine. Every
 * participant's outgoing claims are composed before any vote is applied, so
 * no update made this round leaks into another participant's claims this round.
 */
export class ConsensusEngine {
  private readonly options: ConsensusOptions;

  constructor(options: ConsensusOptions) {
    this.options = options;
  }

  /** Unordered pairs within communication range, `a < b`, sorted. */
  findLinks(participants: readonly ConsensusParticipant[]): CommunicationLink[] {
    const ordered = [...participants].sort((p, q) => p.id - q.id);
    const links: CommunicationLink[] = [];
    for (let i = 0; i < ordered.length; i++) {
      for (let j = i + 1; j < ordered.length; j++) {
        const a = ordered[i];
        const b = ordered[j];
        if (isWithinRange(a.getPosition(), b.getPosition(), this.options.communicationRange)) {
          links.push(Object.freeze({ a: a.id, b: b.id }));
        }
      }
    }
    return links;
  }

  /**
   * Run one consensus phase for a tick.
   *
   * @returns Frozen report of links, every vote taken and every belief change.
   */
  runRound(participants: readonly ConsensusParticipant[], tick: number): ConsensusRoundReport {
    const outgoing = new Map<number, readonly Claim[]>();
    for (const participant of participants) {
      outgoing.set(participant.id, participant.composeClaims(tick));
    }

    const links = this.findLinks(participants);
    const inbox = new Map<number, Claim[]>();
    const deliver = (from: number, to: number): void => {
      const received = inbox.get(to) ?? [];
      received.push(...(outgoing.get(from) ?? []));
      inbox.set(to, received);
    };
    for (const link of links) {
      deliver(link.a, link.b);
      deliver(link.b, link.a);
    }

    const votes: VoteRecord[] = [];
    const changes: BeliefChange[] = [];
    const ordered = [...participants].sort((p, q) => p.id - q.id);
    for (const receiver of ordered) {
      const own = receiver.selfClaims(tick);
      const received = [...(inbox.get(receiver.id) ?? [])].sort((p, q) => p.reporterId - q.reporterId);
      const targetIds = [...new Set([...own, ...received].map((claim) => claim.targetId))].sort((a, b) => a - b);

      for (const targetId of targetIds) {
        const ballot = [
          ...own.filter((claim) => claim.targetId === targetId),
          ...received.filter((claim) => claim.targetId === targetId),
        ];
        const result = tallyVotes(targetId, ballot, this.options.tolerance, this.options.quorum, receiver.id);
        votes.push(
          Object.freeze({
            agentId: receiver.id,
            targetId,
            decision: result.decision,
            topVotes: result.buckets[0]?.votes ?? 0,
            bucketCount: result.buckets.length,
          }),
        );
        const change = receiver.applyVote(result, tick);
        if (change !== null) {
          changes.push(change);
        }
      }
    }

    return Object.freeze({
      tick,
      links: Object.freeze(links),
      votes: Object.freeze(votes),
      changes: Object.freeze(changes),
    });
  }
}
