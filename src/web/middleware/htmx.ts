/**
 * HTMX middleware helpers
 * Utilities for detecting HTMX requests and sending toast notifications
 */

import type { Request, Response } from 'express';

export type ToastType = 'success' | 'error' | 'warning' | 'info';

/**
 * Check if the request is an HTMX request
 * HTMX sets the HX-Request header on all AJAX requests
 */
export function isHtmxRequest(req: Request): boolean {
  return req.headers['hx-request'] === 'true';
}

/**
 * Get the target element ID from HX-Target header
 */
export function getHtmxTarget(req: Request): string | undefined {
  const target = req.headers['hx-target'];
  return typeof target === 'string' ? target : undefined;
}

/**
 * Attach a toast notification to the response
 * The layout script reads these headers after every HTMX request.
 * Header values must be plain ASCII, so the message is URI-encoded.
 */
export function setToast(res: Response, message: string, type: ToastType = 'info'): void {
  res.setHeader('X-Toast-Message', encodeURIComponent(message));
  res.setHeader('X-Toast-Type', type);
}

/**
 * Send rendered JSX (string or promise of string) as HTML
 */
export async function sendHtml(res: Response, html: string | Promise<string>, status = 200): Promise<void> {
  const body = await html;
  res.status(status);
  res.setHeader('Content-Type', 'text/html; charset=utf-8');
  res.send(body);
}
