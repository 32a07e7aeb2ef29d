/**
 * Request orchestration over the corpus, caches and engine.
 */

export {
  TopicService,
  summarizeTopics,
  SUMMARY_SIZE,
  type TopicServiceOptions,
  type BaseAnchorsResponse,
  type TopicsResponse,
} from "./topic-service.js";
