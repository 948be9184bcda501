/**
 * Canned generator: deterministic replies chosen from the NPC's state.
 *
 * - "Trust me" with relationship > 0.4 → grants level 2 access
 * - anger > 0.5 → issues a threat
 * - anything else → observes and deflects
 */

import type { GenerationRequest, ResponseGenerator } from "./provider.js";

export const TRUST_REPLY = `
[ANALYSIS]
- GOAL CHECK: Archive access moves the plan forward. The player has earned some trust.
- MORAL/FEAR CHECK: Alignment allows a little manipulation. Fear is low. Proceed carefully.
- PLAYER PREDICTION: Reliable for now, demanding later.
- STRATEGY: Grant limited access in a confident, direct tone.
[ACTION]
GRANT_ACCESS: Player; LEVEL: 2
[DIALOGUE]
"Very well, partner. Level 2 access is yours. Remember you're only borrowing the keys to *my* archive. Don't disappoint me."
`;

export const THREAT_REPLY = `
[ANALYSIS]
- GOAL CHECK: The player is hostile and wasting time. Shut this down.
- MORAL/FEAR CHECK: Anger outweighs fear. Alignment permits a forceful answer.
- PLAYER PREDICTION: Trying to provoke or distract me.
- STRATEGY: Threaten directly to regain control and put distance between us.
[ACTION]
ISSUE_THREAT: Player; INTENSITY: High
[DIALOGUE]
"**Do not test my patience!** Keep wasting my time and that corridor is the last thing you'll see. Leave. Now."
`;

export const DEFLECT_REPLY = `
[ANALYSIS]
- GOAL CHECK: Harmless but distracting. Stay on mission.
- MORAL/FEAR CHECK: No moral conflict here.
- PLAYER PREDICTION: Stalling or probing.
- STRATEGY: Be evasive and steer back to the mission.
[ACTION]
NO_ACTION: None; REASON: Observing
[DIALOGUE]
"You fret over trivia while the Dynasty's sensors are still humming? Focus. We have bigger problems than your idle questions."
`;

export class CannedResponseGenerator implements ResponseGenerator {
  async generate(request: GenerationRequest): Promise<string> {
    const { state, playerInput } = request;

    if (playerInput.includes("Trust me") && state.relationshipScore > 0.4) {
      return TRUST_REPLY;
    }
    if (state.fleeting.anger > 0.5) {
      return THREAT_REPLY;
    }
    return DEFLECT_REPLY;
  }
}
