export { HNClient, toStory } from "./client.js";
export type { HNItem, Story, DroppedStory, FetchResult } from "./types.js";
