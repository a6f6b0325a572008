// Hacker News Firebase API (https://github.com/HackerNews/API)

export interface HNItem {
  id: number;
  type?: "story" | "job" | "poll" | "pollopt" | "comment";
  by?: string;
  time?: number;
  title?: string;
  url?: string;
  /** HTML body for Ask/Show HN posts */
  text?: string;
  score?: number;
  descendants?: number;
  deleted?: boolean;
  dead?: boolean;
}

export interface Story {
  readonly id: number;
  readonly title: string;
  readonly url?: string;
  readonly text?: string;
  readonly score?: number;
  readonly comments?: number;
  readonly by?: string;
  readonly time?: number;
}

export interface DroppedStory {
  id: number;
  reason: string;
}

export interface FetchResult {
  stories: Story[];
  dropped: DroppedStory[];
}
