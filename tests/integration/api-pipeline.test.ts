/**
 * Integration Tests: Full API Pipeline with Nock
 *
 * Drives the HTTP API through the real OpenAI adapter. Every call to the
 * chat completions endpoint is intercepted; no real API calls are made.
 */

import nock from 'nock';
import request from 'supertest';
import { Application } from 'express';
import { Config } from '../../src/config';
import { createApp } from '../../src/presentation/app';

const OPENAI = 'https://api.openai.com';
const COMPLETIONS = '/v1/chat/completions';

interface ChatRequestBody {
    model: string;
    messages: Array<{ role: string; content: string }>;
}

function isChatRequest(body: unknown): body is ChatRequestBody {
    return typeof body === 'object' && body !== null && 'messages' in body && Array.isArray(body.messages);
}

function promptContaining(fragment: string) {
    return (body: unknown): boolean =>
        isChatRequest(body) && body.messages.length === 1 && body.messages[0].content.includes(fragment);
}

function completion(content: string) {
    return { choices: [{ message: { role: 'assistant', content } }] };
}

const DRAFT = [
    'Here are your posts:',
    '1. Nobody should hate their first week at a new remote job.',
    '2. Send the laptop early, and the welcome note even earlier.',
    '3. A buddy system turns a login into a relationship that lasts.',
].join('\n');

const config: Config = {
    port: 0,
    environment: 'test',
    corsOrigins: ['http://localhost:3000'],
    openaiApiKey: 'test-api-key',
    openaiModel: 'gpt-4o-mini',
    openaiBaseUrl: OPENAI,
};

// ============================================================================
// MOCK SETUP
// ============================================================================
beforeAll(() => {
    nock.disableNetConnect();
    nock.enableNetConnect(/(127\.0\.0\.1|localhost)/);
});

afterAll(() => {
    nock.enableNetConnect();
});

describe('Integration: post generation over HTTP', () => {
    let app: Application;
    let sessionId: string;

    beforeEach(async () => {
        nock.cleanAll();
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });
        jest.spyOn(console, 'error').mockImplementation(() => { });

        app = createApp(config);
        const res = await request(app).post('/api/sessions');
        sessionId = res.body.sessionId;
    });

    afterEach(() => {
        nock.cleanAll();
        jest.restoreAllMocks();
    });

    it('should plan, draft, suggest hashtags and filter the posts', async () => {
        const scope = nock(OPENAI, { reqheaders: { authorization: 'Bearer test-api-key' } })
            .post(COMPLETIONS, promptContaining('outline a brief plan for 3 inspirational posts in English'))
            .reply(200, completion('Plan: one story post, one checklist post, one question post.'))
            .post(COMPLETIONS, promptContaining('Based on this plan:\nPlan: one story post'))
            .reply(200, completion(DRAFT))
            .post(COMPLETIONS, promptContaining('For the topic "Remote onboarding", suggest:\n- Relevant hashtags\n'))
            .reply(200, completion('#RemoteWork #Onboarding'));

        const res = await request(app)
            .post(`/api/sessions/${sessionId}/generate`)
            .send({ topic: 'Remote onboarding', tone: 'Inspirational', wantCTA: false });

        expect(res.status).toBe(200);
        expect(res.body.posts).toHaveLength(3);
        expect(res.body.posts[0]).toEqual({
            option: 1,
            content: 'Nobody should [removed] their first week at a new remote job.',
            words: 11,
            characters: 61,
            fileName: 'linkedin_post_1.txt',
        });
        expect(res.body.posts[2].content).toBe('A buddy system turns a login into a relationship that lasts.');
        expect(res.body.extras).toBe('#RemoteWork #Onboarding');
        expect(typeof res.body.latencySeconds).toBe('number');
        expect(scope.isDone()).toBe(true);
    });

    it('should serve each post of the latest run as a text file', async () => {
        nock(OPENAI)
            .post(COMPLETIONS).reply(200, completion('A plan.'))
            .post(COMPLETIONS).reply(200, completion(DRAFT));

        await request(app)
            .post(`/api/sessions/${sessionId}/generate`)
            .send({ topic: 'Remote onboarding', wantHashtags: false, wantCTA: false })
            .expect(200);

        const res = await request(app).get(`/api/sessions/${sessionId}/posts/2/download`);

        expect(res.status).toBe(200);
        expect(res.headers['content-disposition']).toBe('attachment; filename="linkedin_post_2.txt"');
        expect(res.headers['content-type']).toBe('text/plain; charset=utf-8');
        expect(res.text).toBe('Send the laptop early, and the welcome note even earlier.');
    });

    it('should surface the provider message when the API key is rejected', async () => {
        const scope = nock(OPENAI)
            .post(COMPLETIONS)
            .reply(401, { error: { message: 'Incorrect API key provided', type: 'invalid_request_error' } });

        const res = await request(app)
            .post(`/api/sessions/${sessionId}/generate`)
            .send({ topic: 'Remote onboarding' });

        expect(res.status).toBe(502);
        expect(res.body).toEqual({
            error: {
                message: 'OpenAI call failed: Incorrect API key provided',
                code: 'BadGatewayError',
                step: 'Plan',
            },
        });
        expect(scope.isDone()).toBe(true);

        const history = await request(app).get(`/api/sessions/${sessionId}/history`);
        expect(history.body).toEqual({ runs: [] });
    });

    it('should make no call for an empty topic', async () => {
        const res = await request(app)
            .post(`/api/sessions/${sessionId}/generate`)
            .send({ topic: '   ' });

        expect(res.status).toBe(400);
        expect(res.body.error.message).toBe('Please enter a topic');
        expect(nock.pendingMocks()).toEqual([]);
    });
});
