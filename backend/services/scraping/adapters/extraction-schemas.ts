/**
 * JSON schemas sent with extract requests. Each wraps the item shape in a
 * `results` array so a reply can carry many items.
 */

function listOf(properties: Record<string, { type: string; description: string }>, required: string[]) {
  return {
    type: 'object',
    properties: {
      results: {
        type: 'array',
        items: { type: 'object', properties, required },
      },
    },
    required: ['results'],
  };
}

export const CONTENT_ITEM_SCHEMA = listOf(
  {
    title: { type: 'string', description: 'The title of the content' },
    link: { type: 'string', description: 'URL of the content' },
    thumbnail: { type: 'string', description: 'URL of thumbnail image if available' },
    description: { type: 'string', description: 'Brief description of the content' },
    author: { type: 'string', description: 'Author or creator name' },
    published_date: { type: 'string', description: 'Publication date if available' },
  },
  ['title', 'link'],
);

export const REFERENCE_SCHEMA = listOf(
  {
    title: { type: 'string', description: 'Title of the reference' },
    content: { type: 'string', description: 'Short summary of what the reference says' },
    url: { type: 'string', description: 'URL of the reference' },
    thumbnail_url: { type: 'string', description: 'URL of a thumbnail image if available' },
  },
  ['title', 'content'],
);

export const VIDEO_SCHEMA = listOf(
  {
    title: { type: 'string', description: 'Title of the video' },
    url: { type: 'string', description: 'URL of the video page' },
    thumbnail_url: { type: 'string', description: 'URL of the video thumbnail' },
    duration: { type: 'string', description: 'Length of the video' },
    views: { type: 'string', description: 'View count if shown' },
    upload_date: { type: 'string', description: 'Upload date if shown' },
  },
  ['title', 'url'],
);

export const LINK_SCHEMA = listOf(
  {
    title: { type: 'string', description: 'The title of the linked content' },
    link: { type: 'string', description: 'The URL of the linked content' },
    source: { type: 'string', description: 'The source or origin of the link' },
  },
  ['title', 'link'],
);
