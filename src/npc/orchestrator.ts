/**
 * Per-turn interaction cycle for one NPC.
 *
 * receive(input):
 *   (a) sentiment estimate of the raw input → updateRelationship
 *   (b) record player input in memory
 *   (c) build prompt, ask the generator (failures → fallback reply)
 *   (d) record the NPC's reply in memory
 *   (e) decay fleeting emotions
 *   (f) parse the reply → InteractionRecord
 *
 * Turns are serialized per orchestrator; the orchestrator is the single
 * writer of its PersonaState and MemoryLedger.
 */

import { buildNpcPrompt } from "../llm/prompts.js";
import type { ResponseGenerator } from "../llm/responders/provider.js";
import type { SentimentEstimator } from "../sentiment/keywordSentiment.js";
import { log } from "../utils/logger.js";
import { InvalidStateValueError, UnknownFleetingStateError, UnknownTraitError } from "./errors.js";
import { MemoryLedger } from "./memoryLedger.js";
import { snapshotPersonaState, type PersonaState } from "./personaState.js";
import { parseInteractionResponse, type InteractionRecord } from "./responseParser.js";
import {
  decayFleeting,
  updateFleeting,
  updateRelationship,
  updateTrait,
  type ValueChange,
} from "./statePolicy.js";

const orchestratorLog = log.withScope("orchestrator");

export const DEFAULT_TURN_DECAY = 0.15;
export const DEFAULT_PLAYER_NAME = "Player";

/** Substituted for the generator's reply when it fails; carries only a dialogue section. */
export const COMMUNICATION_BREAKDOWN_REPLY =
  "[DIALOGUE]\n*Static crackles over the line.* \"...can't hear you... the connection is breaking up. We'll talk later.\"";

export type OrchestratorOptions = {
  state: PersonaState;
  generator: ResponseGenerator;
  estimateSentiment: SentimentEstimator;
  ledger?: MemoryLedger;
  playerName?: string;
  turnDecay?: number;
  now?: () => number;
};

export class NpcInteractionOrchestrator {
  readonly state: PersonaState;
  readonly ledger: MemoryLedger;
  readonly playerName: string;

  private generator: ResponseGenerator;
  private estimateSentiment: SentimentEstimator;
  private turnDecay: number;
  private now: () => number;
  private lastTurn: Promise<unknown> = Promise.resolve();

  constructor(opts: OrchestratorOptions) {
    this.state = opts.state;
    this.ledger = opts.ledger ?? new MemoryLedger();
    this.playerName = opts.playerName ?? DEFAULT_PLAYER_NAME;
    this.generator = opts.generator;
    this.estimateSentiment = opts.estimateSentiment;
    this.turnDecay = opts.turnDecay ?? DEFAULT_TURN_DECAY;
    if (!Number.isFinite(this.turnDecay) || this.turnDecay < 0) {
      throw new InvalidStateValueError("turnDecay", this.turnDecay, "a finite number >= 0");
    }
    this.now = opts.now ?? Date.now;
  }

  /**
   * Run one conversational turn. Always resolves with a well-formed record;
   * a turn issued while another is running waits for it to finish.
   */
  receive(input: string): Promise<InteractionRecord> {
    const turn = this.lastTurn.then(() => this.runTurn(input));
    this.lastTurn = turn.catch((err: unknown) => {
      orchestratorLog.error(`Turn failed: ${err instanceof Error ? err.message : String(err)}`);
    });
    return turn;
  }

  private async runTurn(input: string): Promise<InteractionRecord> {
    updateRelationship(this.state, this.estimate(input));

    this.ledger.record(this.playerName, input, this.now());

    const response = await this.requestResponse(input);

    this.ledger.record(this.state.name, response, this.now());

    decayFleeting(this.state, this.turnDecay);

    const record = parseInteractionResponse(response);
    orchestratorLog.debug(`${this.state.name} turn complete`, {
      action: record.action.type,
      relationship: Number(this.state.relationshipScore.toFixed(2)),
    });
    return record;
  }

  /** Non-finite or failed estimates count as neutral. */
  private estimate(input: string): number {
    try {
      const estimate = this.estimateSentiment(input);
      if (Number.isFinite(estimate)) return estimate;
      orchestratorLog.warn(`Ignoring non-finite sentiment estimate: ${estimate}`);
    } catch (err: unknown) {
      orchestratorLog.warn(`Sentiment estimator failed: ${err instanceof Error ? err.message : String(err)}`);
    }
    return 0;
  }

  private async requestResponse(input: string): Promise<string> {
    const prompt = buildNpcPrompt({
      state: this.state,
      ledger: this.ledger,
      playerName: this.playerName,
      playerInput: input,
    });

    try {
      const reply: unknown = await this.generator.generate({
        prompt,
        state: snapshotPersonaState(this.state),
        playerInput: input,
      });
      if (typeof reply === "string") return reply;
      orchestratorLog.warn(`Response generator returned ${typeof reply}, using fallback reply`);
      return COMMUNICATION_BREAKDOWN_REPLY;
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      orchestratorLog.warn(`Response generator unavailable, using fallback reply: ${message}`);
      return COMMUNICATION_BREAKDOWN_REPLY;
    }
  }

  /** Record an event without running a turn (e.g. something the player did). */
  observe(source: string, event: string): void {
    this.ledger.record(source, event, this.now());
  }

  /** Throws InvalidStateValueError for a non-finite delta. */
  adjustRelationship(delta: number): ValueChange {
    return updateRelationship(this.state, delta);
  }

  /** Returns false, leaving state unchanged, when `name` is not a trait or the number is not finite. */
  adjustTrait(name: string, delta: number): boolean {
    try {
      updateTrait(this.state, name, delta);
      return true;
    } catch (err: unknown) {
      if (err instanceof UnknownTraitError || err instanceof InvalidStateValueError) {
        orchestratorLog.warn(err.message);
        return false;
      }
      throw err;
    }
  }

  /** Returns false, leaving state unchanged, when `name` is not a fleeting state or the number is not finite. */
  setFleeting(name: string, value: number): boolean {
    try {
      updateFleeting(this.state, name, value);
      return true;
    } catch (err: unknown) {
      if (err instanceof UnknownFleetingStateError || err instanceof InvalidStateValueError) {
        orchestratorLog.warn(err.message);
        return false;
      }
      throw err;
    }
  }
}
