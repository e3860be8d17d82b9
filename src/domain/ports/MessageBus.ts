import type { Channel } from "../channels.js";
import type { OutboundEvent } from "../events.js";

export interface MessageBus {
  publish(channel: Channel, event: OutboundEvent): Promise<void>;
}
