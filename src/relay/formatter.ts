import type { RelayTransition } from "./types.ts";

export function formatRelayLine(transition: RelayTransition, timestamp: string) {
  const user = transition.subject.name;
  const guild = transition.guild.name;

  switch (transition.kind) {
    case "member_joined":
      return `${user} joined : ${guild} at ${timestamp}`;
    case "channel_access_gained":
      return `${user} gained access to : #${transition.channel.name} in ${guild} at ${timestamp}`;
    case "voice_joined":
      return `${user} joined voice : #${transition.channel.name} in ${guild} at ${timestamp}`;
    case "voice_left":
      return `${user} left voice : #${transition.channel.name} in ${guild} at ${timestamp}`;
    case "voice_moved":
      return `${user} moved voice : #${transition.from.name} → #${transition.to.name} in ${guild} at ${timestamp}`;
  }
}
