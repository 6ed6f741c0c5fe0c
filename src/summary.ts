import type { ComputerObservation } from "./types";

/** Copy of the observation with the screenshot payload replaced by its length. */
export function elideScreenshot(observation: ComputerObservation): ComputerObservation {
  const { screenshot } = observation;
  if (!screenshot) return observation;
  return { ...observation, screenshot: { ...screenshot, data: `<${screenshot.data.length} base64 chars>` } };
}

/** Compact text form for logs and prompts. */
export function describeObservation(observation: ComputerObservation): string {
  return JSON.stringify(elideScreenshot(observation));
}
