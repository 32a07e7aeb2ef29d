export { CooccurrenceEngine, type TopicEngine, type TopicMatrix } from "./engine.js";
