const ONEDRIVE_HOST_HINTS = ['onedrive', '1drv.ms', 'sharepoint.com'];
const GOOGLE_DRIVE_HOST_HINTS = ['drive.google.com', 'docs.google.com'];

/**
 * Rewrites cloud-storage share links into their direct-download form.
 * Unknown hosts and unparseable input come back untouched.
 */
export function normalizeStorageUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }

  const host = parsed.host.toLowerCase();

  if (host.includes('dropbox.com')) {
    parsed.searchParams.set('dl', '1');
    parsed.host = 'www.dropbox.com';
    parsed.port = '';
    return parsed.toString();
  }

  if (ONEDRIVE_HOST_HINTS.some((hint) => host.includes(hint))) {
    parsed.searchParams.set('download', '1');
    return parsed.toString();
  }

  if (GOOGLE_DRIVE_HOST_HINTS.some((hint) => host.includes(hint))) {
    const fileId = extractDriveFileId(parsed);
    if (!fileId) {
      return url;
    }
    const query = new URLSearchParams({ export: 'download', id: fileId });
    return `https://drive.google.com/uc?${query.toString()}`;
  }

  return url;
}

function extractDriveFileId(parsed: URL): string | undefined {
  const parts = parsed.pathname.split('/').filter((part) => part.length > 0);
  if (parts.length >= 3 && parts[0] === 'file' && parts[1] === 'd') {
    return parts[2];
  }

  const queryId = parsed.searchParams.get('id');
  return queryId || undefined;
}
