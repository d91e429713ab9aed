import type { Ecosystem } from './types';

export const PROJECT_COPYRIGHT_FILE_NAME = '.copyright';
export const METADATA_FILE_NAME = '.copyright_meta';
export const DEFAULT_OUTPUT_FILE_NAME = 'COPYRIGHT.txt';

export const DEP5_FORMAT_URL = 'https://www.debian.org/doc/packaging-manuals/copyright-format/1.0/';
export const UNKNOWN_LICENSE = 'UNKNOWN';

// Adapters always run, and merge, in this order.
export const ECOSYSTEMS: readonly Ecosystem[] = ['npm', 'pip', 'gradle', 'nuget'];

export const LICENSE_FILE_PREFIXES = ['license', 'licence'];

export const DEFAULT_PROJECT_DESCRIPTOR = [
  'source_url = https://www.example.com/software/project',
  'upstream_name = Project',
  'upstream_contact_name = Jane Doe',
  'upstream_contact_email = jane.doe@example.com',
  'thirdparty_folder_path = thirdparty',
  ''
].join('\n');
