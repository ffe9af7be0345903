/**
 * Document paths: collection/document pairs separated by '/'
 */

import { err, ok, type Result } from '@hostloop/persistence';
import { InvalidDocumentPathError } from './errors.js';

export function validateDocumentPath(path: string): Result<string, InvalidDocumentPathError> {
  if (path.length === 0) {
    return err(new InvalidDocumentPathError(path, 'path is empty'));
  }

  const segments = path.split('/');
  if (segments.some((segment) => segment.length === 0)) {
    return err(new InvalidDocumentPathError(path, 'empty segment'));
  }
  if (segments.some((segment) => segment === '.' || segment === '..')) {
    return err(new InvalidDocumentPathError(path, 'relative segment'));
  }
  if (segments.length % 2 !== 0) {
    return err(new InvalidDocumentPathError(path, 'expected collection/document pairs'));
  }

  return ok(path);
}

