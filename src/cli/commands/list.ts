import { UsageError } from '../../lib/errors/errors.js';
import { formatDirListing } from '../../lib/service/dir-listing.js';
import { render } from '../logger.js';

export async function handleListCommand(dir: string | undefined): Promise<void> {
  if (!dir) throw UsageError.missingArgument('dir');
  render.raw(await formatDirListing(dir));
}
