/**
 * Default Configuration Values
 *
 * Used when no config.toml exists and for any field a user's config.toml
 * leaves out. The loader merges user config ON TOP of these defaults.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  chunking: {
    chunk_size: 1000,
    overlap: 200,
    min_post_length: 20,
  },

  embedding: {
    model: 'models/embedding-001',
    task_type: 'RETRIEVAL_DOCUMENT',
    max_retries: 3,
    timeout_ms: 60000,
  },

  // The MIME fallback is an approximation: servers that omit Content-Type
  // get their images tagged as webp whatever the real format
  captioning: {
    enabled: true,
    model: 'gemini-1.5-flash',
    max_retries: 2,
    default_mime_type: 'image/webp',
    timeout_ms: 60000,
  },

  // Free-tier quota: 2 calls/second, 60 calls/minute
  rate_limit: {
    rps: 2,
    rpm: 60,
  },

  sources: {
    markdown_dir: 'data/markdown',
    discourse_dir: 'data/discourse_posts',
    discourse_base_url: 'https://discourse.example.com',
    markdown_base_url: 'https://docs.example.com/#/',
  },

  storage: {
    database_path: 'data/knowledge_base.db',
    output_path: 'data/embeddings.json',
  },
};

/**
 * Config file template (TOML format)
 * Written to $KBI_HOME/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# kb-ingest configuration
# Location: ~/.kbi/config.toml (or $KBI_HOME/config.toml)

# Chunking
# overlap must stay below chunk_size
[chunking]
chunk_size = ${DEFAULT_CONFIG.chunking.chunk_size}
overlap = ${DEFAULT_CONFIG.chunking.overlap}
min_post_length = ${DEFAULT_CONFIG.chunking.min_post_length}

# Text embeddings
[embedding]
model = "${DEFAULT_CONFIG.embedding.model}"
task_type = "${DEFAULT_CONFIG.embedding.task_type}"
max_retries = ${DEFAULT_CONFIG.embedding.max_retries}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}

# Image captions (captions are embedded like text chunks)
[captioning]
enabled = ${DEFAULT_CONFIG.captioning.enabled}
model = "${DEFAULT_CONFIG.captioning.model}"
max_retries = ${DEFAULT_CONFIG.captioning.max_retries}
default_mime_type = "${DEFAULT_CONFIG.captioning.default_mime_type}"  # used when the server sends no Content-Type
timeout_ms = ${DEFAULT_CONFIG.captioning.timeout_ms}

# Shared quota for every outbound call
[rate_limit]
rps = ${DEFAULT_CONFIG.rate_limit.rps}
rpm = ${DEFAULT_CONFIG.rate_limit.rpm}

# Raw corpus
[sources]
markdown_dir = "${DEFAULT_CONFIG.sources.markdown_dir}"
discourse_dir = "${DEFAULT_CONFIG.sources.discourse_dir}"
discourse_base_url = "${DEFAULT_CONFIG.sources.discourse_base_url}"
markdown_base_url = "${DEFAULT_CONFIG.sources.markdown_base_url}"

# Data files
[storage]
database_path = "${DEFAULT_CONFIG.storage.database_path}"
output_path = "${DEFAULT_CONFIG.storage.output_path}"
`;
