import { Agent } from 'undici';

const agents = new Map<string, Agent>();

/** Keep-alive agent per upstream host group, created on first use. */
export function getAgent(key: string) {
  let a = agents.get(key);
  if (!a) {
    a = new Agent({
      keepAliveTimeout: 10_000,
      keepAliveMaxTimeout: 60_000,
      connections: 8,
      bodyTimeout: 120_000, // the F&O master runs to tens of MB
    });
    agents.set(key, a);
  }
  return a;
}

export async function closeAgents() {
  const all = [...agents.values()];
  agents.clear();
  await Promise.all(all.map((a) => a.close()));
}
