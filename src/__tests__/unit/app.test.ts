/**
 * Tests for createApp wiring (load failures shown in the editor)
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync } from 'node:fs';
import request from 'supertest';
import { createApp } from '../../index.js';
import { createTestCatalog, removeTestCatalog, type TestCatalogContext } from '../helpers/index.js';

describe('createApp', () => {
  let ctx: TestCatalogContext;

  beforeEach(() => {
    ctx = createTestCatalog();
  });

  afterEach(() => {
    removeTestCatalog(ctx);
  });

  it('shows a malformed catalog file once on the editor page', async () => {
    ctx.write('[{"title": ');
    const app = createApp({ songsFile: ctx.filePath });

    const first = await request(app.server).get('/').expect(200);
    const second = await request(app.server).get('/').expect(200);

    expect(app.editor.count()).toBe(0);
    expect(first.text).toContain(`Failed to load ${ctx.filePath}: invalid JSON`);
    expect(second.text).not.toContain('Failed to load');
  });

  it('does not turn later save failures into page notices', async () => {
    ctx.write('[{"title": ');
    const app = createApp({ songsFile: ctx.filePath });
    await request(app.server).get('/').expect(200);

    rmSync(ctx.filePath);
    mkdirSync(ctx.filePath);
    const result = app.editor.add({ title: 'Amazing Grace' });

    expect(result.status === 'ok' && result.saved.ok).toBe(false);
    const page = await request(app.server).get('/').expect(200);
    expect(page.text).not.toContain('Failed to save');
    expect(page.text).not.toContain('Failed to load');
  });

  it('loads a valid catalog without notices', async () => {
    ctx.write('[{"title": "Amazing Grace", "number": "12"}]');
    const app = createApp({ songsFile: ctx.filePath });

    const page = await request(app.server).get('/').expect(200);

    expect(app.editor.count()).toBe(1);
    expect(page.text).toContain('<td>Amazing Grace</td>');
    expect(page.text).not.toContain('Failed to');
  });
});
