/**
 * Source Module - Pure Transformations
 */

/**
 * Split a message payload into non-empty, trimmed lines.
 * A single MQTT message may carry several radar frames.
 */
export function splitPayloadLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Display name for an MQTT source.
 */
export function describeMqttSource(brokerUrl: string, topic: string): string {
  try {
    const url = new URL(brokerUrl);
    return `mqtt://${url.host}/${topic}`;
  } catch {
    return `${brokerUrl}/${topic}`;
  }
}
