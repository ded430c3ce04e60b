export * from "./FeedGenerator";
export * from "./FeedGeneratorFeed";
