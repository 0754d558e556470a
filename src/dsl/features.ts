import { YamlMapping, isMapping } from './guards.js';
import { ValidationCollector } from './result.js';

const FILE_UPLOAD_ARRAY_FIELDS = ['allowed_file_types', 'allowed_file_extensions', 'allowed_file_upload_methods'] as const;

/** Check `workflow.features` against what the editor expects to find. */
export function validateFeatures(workflow: YamlMapping, collector: ValidationCollector): void {
  const features = workflow.features;
  if (!isMapping(features)) return;

  const fileUpload = features.file_upload;
  if (isMapping(fileUpload) && fileUpload.enabled) {
    for (const field of FILE_UPLOAD_ARRAY_FIELDS) {
      if (!(field in fileUpload)) {
        collector.warning(
          'frontend_compatibility',
          'MISSING_FILE_UPLOAD_FIELD',
          `file_upload.${field} is missing. Frontend may use default values.`,
          { field },
        );
      } else if (!Array.isArray(fileUpload[field])) {
        collector.warning(
          'frontend_compatibility',
          'INVALID_FILE_UPLOAD_FIELD_TYPE',
          `file_upload.${field} should be an array`,
          { field },
        );
      }
    }

    if (!('fileUploadConfig' in fileUpload)) {
      collector.warning(
        'frontend_compatibility',
        'MISSING_FILE_UPLOAD_CONFIG',
        'file_upload.fileUploadConfig is missing. Frontend may use default values.',
      );
    }

    const image = fileUpload.image;
    if (isMapping(image) && image.enabled && !Array.isArray(image.transfer_methods)) {
      collector.warning(
        'frontend_compatibility',
        'MISSING_IMAGE_TRANSFER_METHODS',
        'file_upload.image.transfer_methods should be an array',
      );
    }
  }

  const suggestedQuestions = features.suggested_questions;
  if (suggestedQuestions !== undefined && suggestedQuestions !== null && !Array.isArray(suggestedQuestions)) {
    collector.error(
      'frontend_compatibility',
      'INVALID_SUGGESTED_QUESTIONS_TYPE',
      'features.suggested_questions must be an array',
    );
  }
}
