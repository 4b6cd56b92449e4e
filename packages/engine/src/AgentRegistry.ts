import { Seat } from "@llmduel/core";
import { Agent } from "./interfaces/IProposalSource";

/**
 * In-memory registry of the agents resident for the process lifetime.
 * Games borrow two of them; the registry never hands out the same agent
 * for both seats.
 */
export class AgentRegistry {
  private agents = new Map<string, Agent>();

  register(agent: Agent): void {
    if (this.agents.has(agent.name)) {
      throw new Error(`Agent "${agent.name}" is already registered`);
    }
    this.agents.set(agent.name, agent);
  }

  get(name: string): Agent | undefined {
    return this.agents.get(name);
  }

  list(): Agent[] {
    return Array.from(this.agents.values());
  }

  has(name: string): boolean {
    return this.agents.has(name);
  }

  /** Seat binding for one game: `playerName` moves first. */
  bind(playerName: string, opponentName: string): Record<Seat, Agent> {
    if (playerName === opponentName) {
      throw new Error(`Agent "${playerName}" cannot occupy both seats`);
    }
    return { player: this.require(playerName), opponent: this.require(opponentName) };
  }

  private require(name: string): Agent {
    const agent = this.agents.get(name);
    if (!agent) {
      const known = this.list().map((a) => a.name).join(", ") || "none";
      throw new Error(`Unknown agent "${name}" (registered: ${known})`);
    }
    return agent;
  }
}
