/**
 * Static pages returned to the browser by the redirect listener
 */

import type { RedirectOutcome } from './redirect-dispatcher.js';

export interface RedirectPage {
  status: number;
  html: string;
}

type Tone = 'success' | 'info' | 'error';

const ACCENT: Record<Tone, string> = {
  success: '#38a169',
  info: '#3182ce',
  error: '#e53e3e',
};

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function renderPage(title: string, message: string, tone: Tone): string {
  return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8"/>
    <meta name="viewport" content="width=device-width, initial-scale=1">
    <title>${escapeHtml(title)}</title>
    <style>
      body {
        font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Oxygen, Ubuntu, Cantarell, 'Helvetica Neue', sans-serif;
        background: #f7fafc;
        min-height: 100vh;
        margin: 0;
        display: flex;
        align-items: center;
        justify-content: center;
      }
      .card {
        background: white;
        border-top: 4px solid ${ACCENT[tone]};
        border-radius: 12px;
        box-shadow: 0 20px 60px rgba(0,0,0,0.1);
        max-width: 420px;
        padding: 40px;
        text-align: center;
      }
      h1 {
        font-size: 24px;
        color: #1a202c;
        margin: 0 0 12px;
      }
      p {
        color: #4a5568;
        font-size: 15px;
        margin: 0;
      }
    </style>
  </head>
  <body>
    <div class="card">
      <h1>${escapeHtml(title)}</h1>
      <p>${escapeHtml(message)}</p>
    </div>
  </body>
</html>`;
}

/**
 * Page and status for a dispatch outcome. A stray hit with nothing
 * pending is not an error.
 */
export function renderRedirectPage(outcome: RedirectOutcome): RedirectPage {
  switch (outcome.kind) {
    case 'accepted':
      return {
        status: 200,
        html: renderPage('Signed in', 'Authentication is complete. You can close this window and return to the application.', 'success'),
      };
    case 'denied':
      return {
        status: 400,
        html: renderPage('Sign-in cancelled', `The provider did not grant access: ${outcome.error.providerError}.`, 'error'),
      };
    case 'rejected':
      return {
        status: 400,
        html: renderPage('Sign-in failed', 'This sign-in link is no longer valid. Start the sign-in again from the application.', 'error'),
      };
    case 'noPending':
      return {
        status: 200,
        html: renderPage('No pending authentication', 'There is no sign-in in progress. You can close this window.', 'info'),
      };
  }
}
