// src/core/normalizer/types.ts

export type ObjectType = 'note' | 'article' | 'image' | 'activity' | 'person' | 'hashtag';

export type Verb = 'post' | 'share';

export interface MediaLink {
  url: string;
}

export interface Location {
  displayName?: string;
  id?: string;
  url?: string;
}

export interface Actor {
  id?: string; // tag URI
  displayName?: string;
  username?: string;
  url?: string;
  image?: MediaLink;
  location?: Location;
  published?: string; // ISO 8601, no zone
  description?: string;
}

/**
 * Note, tag, attachment or (for retweets) share object
 */
export interface ActivityObject {
  objectType?: ObjectType;
  id?: string;
  url?: string;
  displayName?: string;
  published?: string;
  content?: string;
  author?: Actor;
  image?: MediaLink;
  attachments?: ActivityObject[];
  tags?: ActivityObject[];
  location?: Location;
  startIndex?: number;
  length?: number;
  verb?: Verb;
  object?: ActivityObject;
}

export interface Generator {
  displayName?: string;
  url?: string;
}

export interface Activity {
  verb?: Verb;
  id?: string;
  url?: string;
  published?: string;
  actor?: Actor;
  object?: ActivityObject;
  context?: {
    inReplyTo?: ActivityObject[];
  };
  generator?: Generator;
}
