export {
  parseMarkdown,
  extractSourceUrl,
  extractImageUrls,
  stripMarkdown,
  type ParsedMarkdown,
} from './markdown.js';

export {
  parseTopicFile,
  cleanHtml,
  buildTopicUrl,
  DiscoursePostSchema,
  DiscourseTopicFileSchema,
  type DiscoursePost,
  type DiscourseTopic,
  type TopicParseResult,
} from './discourse.js';

export {
  annotateSourceUrl,
  annotateFile,
  pageNameFromPath,
  pageUrlFromPath,
  formatSourceUrlComment,
  type AnnotationAction,
  type AnnotationResult,
} from './source-url.js';
