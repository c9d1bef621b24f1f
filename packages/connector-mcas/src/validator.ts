/**
 * Defender for Cloud Apps configuration check
 *
 * Runs after the generic activation rules, so mandatory values are known to
 * be present and of the right kind.
 */

import type {
  ConfigurationCheckResult,
  ConfigurationIssue,
  ConfigurationValues,
} from '@siemlink/core';

const HOST_PATTERN =
  /^[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?(?:\.[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?)+$/;

function checkPortalUrl(value: string): string | null {
  const trimmed = value.trim();
  if (!trimmed.includes('://')) {
    return HOST_PATTERN.test(trimmed) ? null : 'must be a host name such as contoso.portal.cloudappsecurity.com';
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    return 'is not a valid URL';
  }
  if (url.protocol !== 'https:') {
    return 'must use https';
  }
  if ((url.pathname !== '/' && url.pathname !== '') || url.search || url.hash) {
    return 'must not include a path, query or fragment';
  }
  if (url.username || url.password) {
    return 'must not embed credentials';
  }
  return null;
}

export function validateMcasConfiguration(values: ConfigurationValues): ConfigurationCheckResult {
  const issues: ConfigurationIssue[] = [];

  const portalUrl = values.portal_url;
  if (typeof portalUrl !== 'string' || portalUrl.trim().length === 0) {
    issues.push({ key: 'portal_url', message: 'Portal URL is required' });
  } else {
    const problem = checkPortalUrl(portalUrl);
    if (problem) {
      issues.push({ key: 'portal_url', message: `Portal URL ${problem}` });
    }
  }

  const token = values.token;
  if (typeof token !== 'string' || token.trim().length === 0) {
    issues.push({ key: 'token', message: 'API token is required' });
  }

  const dataSource = values.data_source;
  if (typeof dataSource !== 'string' || dataSource.trim().length === 0) {
    issues.push({ key: 'data_source', message: 'Data source is required' });
  } else if (/\s/.test(dataSource.trim())) {
    issues.push({ key: 'data_source', message: 'Data source must not contain whitespace' });
  }

  return { valid: issues.length === 0, issues };
}
