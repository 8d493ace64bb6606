/**
 * Tests for the Express application factory (src/app.ts), over the
 * in-process platform: every route goes through the real gateway, router
 * and ledger; only the applications table is an in-memory stand-in.
 */

import { describe, it, expect } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from './app.js';
import { CSV_COLUMNS } from './ledger/ledgerExport.js';
import { credentialForRole } from './test/fixtures.js';
import { createTestPlatform, type TestPlatform } from './test/harness.js';
import { InMemoryApplicationRepository, makeApplication } from './test/inMemoryApplicationRepository.js';
import type { Application } from './repositories/applicationRepository.js';
import type { Role } from './types/index.js';
import { NOT_FOUND_BODY } from './utils/responses.js';

interface Harness {
  app: Express;
  platform: TestPlatform;
}

async function setup(extra: Application[] = []): Promise<Harness> {
  const platform = await createTestPlatform();
  const applications = new InMemoryApplicationRepository([
    makeApplication({ id: 'app-1' }),
    makeApplication({ id: 'app-2', borrowerId: 'borrower_2', assignedTo: 'officer_8', ssn: '987-65-4321' }),
    ...extra,
  ]);
  const app = createApp({
    gateway: platform.gateway,
    router: platform.router,
    ledger: platform.ledger,
    applications,
  });
  return { app, platform };
}

function bearer(role: Role, subject?: string): string {
  return `Bearer ${credentialForRole(role, subject)}`;
}

function lastPayload(platform: TestPlatform): Record<string, unknown> | undefined {
  return platform.ledgerStore.rows.at(-1)?.payload;
}

describe('authentication', () => {
  it('rejects a request without a credential and records the denial', async () => {
    const { app, platform } = await setup();

    const res = await request(app).get('/api/applications').set('x-request-id', 'req-1');

    expect(res.status).toBe(401);
    expect(res.body).toEqual({
      success: false,
      error: { code: 'UNAUTHENTICATED', message: 'Authentication required.' },
      requestId: 'req-1',
    });
    expect(lastPayload(platform)).toMatchObject({
      operation: 'GET /api/applications',
      outcome: 'DENY',
      denialReason: 'AUTHENTICATION_FAILED',
      detail: 'credential_missing',
    });
  });

  it('gives a prospect the account prompt for a route it cannot use', async () => {
    const { app } = await setup();
    const res = await request(app).get('/api/applications').set('authorization', bearer('prospect'));
    expect(res.status).toBe(403);
    expect(res.body.error).toEqual({ code: 'FORBIDDEN', message: 'Please create an account to continue.' });
  });

  it('sends unknown routes through the gateway', async () => {
    const { app, platform } = await setup();

    const res = await request(app).get('/api/nothing').set('authorization', bearer('borrower'));

    expect(res.status).toBe(403);
    expect(lastPayload(platform)).toMatchObject({
      operation: 'GET /api/nothing',
      denialReason: 'UNKNOWN_OPERATION',
    });
  });
});

describe('GET /api/applications', () => {
  it('lists only the borrower own applications', async () => {
    const { app } = await setup();
    const res = await request(app).get('/api/applications').set('authorization', bearer('borrower'));
    expect(res.status).toBe(200);
    expect(res.body.data.map((a: { id: string }) => a.id)).toEqual(['app-1']);
  });

  it('lists only applications assigned to the loan officer', async () => {
    const { app } = await setup();
    const res = await request(app).get('/api/applications').set('authorization', bearer('loan_officer', 'officer_8'));
    expect(res.body.data.map((a: { id: string }) => a.id)).toEqual(['app-2']);
  });

  it('masks identifiers for the ceo', async () => {
    const { app } = await setup();
    const res = await request(app).get('/api/applications').set('authorization', bearer('ceo'));

    expect(res.body.data).toHaveLength(2);
    expect(res.body.data[0]).toMatchObject({
      id: 'app-1',
      ssn: '***-**-6789',
      dob: '1985-**-**',
      accountNumber: '****5678',
    });
  });

  it('rejects an out-of-range limit', async () => {
    const { app } = await setup();
    const res = await request(app).get('/api/applications?limit=500').set('authorization', bearer('ceo'));
    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('VALIDATION_FAILED');
    expect(Object.keys(res.body.error.fields)).toEqual(['limit']);
  });
});

describe('GET /api/applications/:applicationId', () => {
  it('returns an in-scope application', async () => {
    const { app } = await setup();
    const res = await request(app).get('/api/applications/app-1').set('authorization', bearer('borrower'));
    expect(res.status).toBe(200);
    expect(res.body.data.id).toBe('app-1');
  });

  it('answers out-of-scope and missing records with byte-identical bodies', async () => {
    const { app, platform } = await setup();

    const outOfScope = await request(app).get('/api/applications/app-2').set('authorization', bearer('borrower'));
    const outOfScopeDetail = lastPayload(platform)?.['detail'];
    const missing = await request(app).get('/api/applications/app-404').set('authorization', bearer('borrower'));
    const missingDetail = lastPayload(platform)?.['detail'];

    expect(outOfScope.status).toBe(404);
    expect(missing.status).toBe(404);
    expect(outOfScope.text).toBe(missing.text);
    expect(missing.text).toBe(JSON.stringify(NOT_FOUND_BODY));
    expect([outOfScopeDetail, missingDetail]).toEqual(['resource_out_of_scope', 'resource_missing']);
  });
});

describe('demographic routes', () => {
  it('collects demographics without echoing them', async () => {
    const { app, platform } = await setup();

    const res = await request(app)
      .post('/api/hmda/collect')
      .set('authorization', bearer('borrower'))
      .send({ subjectId: 'app-1', race: 'Asian', sex: 'Female' });

    expect(res.status).toBe(201);
    expect(Object.keys(res.body.data)).toEqual(['recordId']);
    expect(lastPayload(platform)).toMatchObject({ action: 'isolated_write', recordId: res.body.data.recordId });
  });

  it('answers collection for another borrower application and a missing one with the not-found body', async () => {
    const { app, platform } = await setup();
    const collect = (subjectId: string) =>
      request(app)
        .post('/api/hmda/collect')
        .set('authorization', bearer('borrower'))
        .send({ subjectId, race: 'Asian' });

    const otherBorrower = await collect('app-2');
    const otherDetail = lastPayload(platform)?.['detail'];
    const missing = await collect('does-not-exist');
    const missingDetail = lastPayload(platform)?.['detail'];

    expect(otherBorrower.status).toBe(404);
    expect(missing.status).toBe(404);
    expect(otherBorrower.text).toBe(JSON.stringify(NOT_FOUND_BODY));
    expect(missing.text).toBe(otherBorrower.text);
    expect([otherDetail, missingDetail]).toEqual(['resource_out_of_scope', 'resource_missing']);
    expect(platform.ledgerStore.rows.map((row) => row.eventType)).toEqual(['query', 'query']);
  });

  it('lets a loan officer collect only for assigned applications', async () => {
    const { app } = await setup();
    const collect = (subjectId: string) =>
      request(app)
        .post('/api/hmda/collect')
        .set('authorization', bearer('loan_officer', 'officer_7'))
        .send({ subjectId, sex: 'Male' });

    expect((await collect('app-1')).status).toBe(201);
    expect((await collect('app-2')).status).toBe(404);
  });

  it('rejects unexpected fields on the collection path', async () => {
    const { app } = await setup();
    const res = await request(app)
      .post('/api/hmda/collect')
      .set('authorization', bearer('borrower'))
      .send({ subjectId: 'app-1', race: 'Asian', income: 85000 });
    expect(res.status).toBe(400);
    expect(Object.keys(res.body.error.fields)).toEqual(['body']);
  });

  it('returns insufficient_sample for twelve records', async () => {
    const { app } = await setup(Array.from({ length: 12 }, (_, i) => makeApplication({ id: `app-${i}` })));
    for (let i = 0; i < 12; i++) {
      await request(app)
        .post('/api/hmda/collect')
        .set('authorization', bearer('borrower'))
        .send({ subjectId: `app-${i}`, race: 'Asian' })
        .expect(201);
    }

    const res = await request(app)
      .post('/api/hmda/aggregate')
      .set('authorization', bearer('ceo'))
      .send({ groupBy: ['race'] });

    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({ kind: 'insufficient_sample', minimumSampleSize: 30 });
  });

  it('keeps aggregates from the underwriter', async () => {
    const { app } = await setup();
    const res = await request(app)
      .post('/api/hmda/aggregate')
      .set('authorization', bearer('underwriter'))
      .send({ groupBy: ['race'] });
    expect(res.status).toBe(403);
  });
});

describe('POST /api/documents/extractions', () => {
  it('strips demographic fields from extracted content', async () => {
    const { app } = await setup();

    const res = await request(app)
      .post('/api/documents/extractions')
      .set('authorization', bearer('loan_officer', 'officer_7'))
      .send({ payload: { employer: 'Acme', applicantRace: 'White' }, sourceRef: 'doc-1', subjectId: 'app-1' });

    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({
      cleanedPayload: { employer: 'Acme' },
      excludedFields: ['applicantRace'],
      routedToIsolation: true,
    });
  });
});

describe('decisions and audit', () => {
  async function recordOverride(harness: Harness): Promise<string> {
    const res = await request(harness.app)
      .post('/api/decisions')
      .set('authorization', bearer('underwriter'))
      .send({
        subjectId: 'app-1',
        outcome: 'approved',
        rationale: 'Debt-to-income within limits',
        recommenderOutput: { outcome: 'denied', ssn: '123-45-6789' },
        humanOutput: { outcome: 'approved' },
      });
    expect(res.status).toBe(201);
    expect(res.body.data.overridden).toBe(true);
    return res.body.data.decisionId;
  }

  it('traces a decision for the ceo with masks applied', async () => {
    const harness = await setup();
    const decisionId = await recordOverride(harness);

    const res = await request(harness.app)
      .get(`/api/audit/decisions/${decisionId}/trace`)
      .set('authorization', bearer('ceo'));

    expect(res.status).toBe(200);
    const last = res.body.data.at(-1);
    expect(last.eventType).toBe('override');
    expect(last.payload.decisionId).toBe(decisionId);
    expect(last.payload.recommenderOutput.ssn).toBe('***-**-6789');
  });

  it('returns the shared not-found body for an unknown decision', async () => {
    const { app } = await setup();
    const res = await request(app).get('/api/audit/decisions/none/trace').set('authorization', bearer('ceo'));
    expect(res.status).toBe(404);
    expect(res.text).toBe(JSON.stringify(NOT_FOUND_BODY));
  });

  it('shows the admin unmasked subject history', async () => {
    const harness = await setup();
    await recordOverride(harness);

    const res = await request(harness.app).get('/api/audit/subjects/app-1').set('authorization', bearer('admin'));

    const override = res.body.data.find((e: { eventType: string }) => e.eventType === 'override');
    expect(override.payload.recommenderOutput.ssn).toBe('123-45-6789');
  });

  it('searches by event type', async () => {
    const harness = await setup();
    await recordOverride(harness);

    const res = await request(harness.app)
      .post('/api/audit/search')
      .set('authorization', bearer('ceo'))
      .send({ eventTypes: ['override'] });

    expect(res.status).toBe(200);
    expect(res.body.data).toHaveLength(1);
    expect(res.body.data[0].payload.outcome).toBe('approved');
  });

  it('matches a ceo search predicate against masked values only', async () => {
    const harness = await setup();
    await recordOverride(harness);

    const search = (value: string) =>
      request(harness.app)
        .post('/api/audit/search')
        .set('authorization', bearer('ceo'))
        .send({ eventTypes: ['override'], predicate: { path: 'recommenderOutput.ssn', op: 'eq', value } });

    const fullSsn = await search('123-45-6789');
    const maskedSsn = await search('***-**-6789');

    expect(fullSsn.status).toBe(200);
    expect(fullSsn.body.data).toEqual([]);
    expect(maskedSsn.body.data).toHaveLength(1);
    expect(maskedSsn.body.data[0].payload.recommenderOutput).toEqual({ outcome: 'denied', ssn: '***-**-6789' });
  });

  it('rejects a malformed predicate', async () => {
    const { app } = await setup();
    const res = await request(app)
      .post('/api/audit/search')
      .set('authorization', bearer('ceo'))
      .send({ predicate: { path: 'outcome', op: 'like', value: 'a%' } });
    expect(res.status).toBe(400);
  });

  it('verifies the chain for the admin', async () => {
    const harness = await setup();
    await recordOverride(harness);

    const res = await request(harness.app).get('/api/audit/verify').set('authorization', bearer('admin'));

    expect(res.status).toBe(200);
    expect(res.body.data).toMatchObject({ valid: true, firstBrokenAt: null });
  });

  it('exports the ledger as csv, including the export event itself', async () => {
    const { app, platform } = await setup();

    const res = await request(app).get('/api/audit/export?format=csv').set('authorization', bearer('admin'));

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
    const lines = res.text.trimEnd().split('\n');
    expect(lines[0]).toBe(CSV_COLUMNS.join(','));
    // query decision, then the export's own data_access event
    expect(lines).toHaveLength(1 + platform.ledgerStore.rows.length);
    expect(platform.ledgerStore.rows.at(-1)?.payload['action']).toBe('ledger_export');
  });

  it('rejects malformed JSON bodies', async () => {
    const { app } = await setup();
    const res = await request(app)
      .post('/api/decisions')
      .set('authorization', bearer('underwriter'))
      .set('content-type', 'application/json')
      .send('{"subjectId":');
    expect(res.status).toBe(400);
    expect(res.body.error.fields).toEqual({ body: ['Malformed JSON'] });
  });
});
