import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../src/app';
import { createDatabase, type DB } from '../src/db/database';
import type { Role } from '../src/types';

const password = 'test-password';

async function signupAndLogin(app: Express, role: Role, email: string) {
  await request(app)
    .post(`/signup/${role}/`)
    .type('form')
    .send({ first_name: role, last_name: 'Tester', email, password })
    .expect(302);
  const login = await request(app).post('/join/').type('form').send({ username: email, password }).expect(200);
  const token: string = login.body.token;
  const id: number = login.body.user.id;
  return { id, auth: `Bearer ${token}` };
}

const rowCount = (db: DB, table: 'users' | 'profiles' | 'jobs' | 'applications') =>
  db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get()?.count;

describe('HTTP surface', () => {
  let db: DB;
  let app: Express;

  beforeEach(() => {
    db = createDatabase(':memory:');
    app = createApp(db);
  });

  it('serves the public home page with the anonymous menu', async () => {
    const res = await request(app).get('/').expect(200);

    expect(res.body).toMatchObject({ view: 'home', user: null, unreadMessageCount: 0 });
    expect(res.body.navigation).toEqual([
      { name: 'Sign Up', url: '/signup/' },
      { name: 'Login', url: '/join/' },
    ]);
  });

  it('re-renders signup with an inline error for a taken e-mail', async () => {
    await signupAndLogin(app, 'client', 'dup@example.com');
    const res = await request(app)
      .post('/signup/freelancer/')
      .type('form')
      .send({ first_name: 'A', last_name: 'B', email: 'dup@example.com', password })
      .expect(200);

    expect(res.body).toMatchObject({ view: 'signup', role: 'freelancer', error: 'Email already registered.' });
  });

  it('re-renders the login form on bad credentials', async () => {
    const res = await request(app).post('/join/').type('form').send({ username: 'x@example.com', password }).expect(200);

    expect(res.body).toMatchObject({ view: 'login', error: 'Please enter a correct username and password.' });
  });

  it('gates pages by role', async () => {
    const client = await signupAndLogin(app, 'client', 'c@example.com');

    expect((await request(app).get('/available-jobs/').expect(302)).headers.location).toBe('/');
    expect((await request(app).get('/my-jobs/').expect(302)).headers.location).toBe('/join/');
    expect((await request(app).get('/available-jobs/').set('Authorization', client.auth).expect(302)).headers.location).toBe('/');
    expect((await request(app).get('/signup/').set('Authorization', client.auth).expect(302)).headers.location).toBe('/');
  });

  it('stores 0 for a non-numeric budget and ignores incomplete forms', async () => {
    const client = await signupAndLogin(app, 'client', 'c@example.com');

    await request(app)
      .post('/post/')
      .set('Authorization', client.auth)
      .type('form')
      .send({ title: 'Logo', description: 'Need one', budget: 'abc' })
      .expect(302)
      .expect('Location', '/');
    const incomplete = await request(app)
      .post('/post/')
      .set('Authorization', client.auth)
      .type('form')
      .send({ title: '', description: 'Missing title', budget: '10' })
      .expect(200);

    expect(incomplete.body.view).toBe('post_job');
    expect(rowCount(db, 'jobs')).toBe(1);

    const dashboard = await request(app).get('/my-jobs/').set('Authorization', client.auth).expect(200);
    expect(dashboard.body.jobs).toHaveLength(1);
    expect(dashboard.body.jobs[0]).toMatchObject({ title: 'Logo', budget: 0, status: 'open', active_application_count: 0 });
  });

  it('re-renders an incomplete application form without saving it', async () => {
    const client = await signupAndLogin(app, 'client', 'c@example.com');
    const freelancer = await signupAndLogin(app, 'freelancer', 'f@example.com');
    await request(app)
      .post('/post/')
      .set('Authorization', client.auth)
      .type('form')
      .send({ title: 'T', description: 'D', budget: '5' })
      .expect(302);
    const jobId = db.prepare<[], { id: number }>('SELECT id FROM jobs').get()?.id ?? 0;

    const res = await request(app)
      .post(`/apply/${jobId}/`)
      .set('Authorization', freelancer.auth)
      .type('form')
      .send({ applicant_name: 'Finn', proposal: '' })
      .expect(200);

    expect(res.body.view).toBe('apply_job');
    expect(res.body.job.id).toBe(jobId);
    expect(rowCount(db, 'applications')).toBe(0);
  });

  it('re-renders an incomplete signup form without creating an account', async () => {
    const res = await request(app)
      .post('/signup/client/')
      .type('form')
      .send({ first_name: 'Ada', last_name: '', email: 'ada@example.com', password })
      .expect(200);

    expect(res.body).toMatchObject({ view: 'signup', role: 'client' });
    expect(res.body.error).toBeUndefined();
    expect(rowCount(db, 'users')).toBe(0);
    expect(rowCount(db, 'profiles')).toBe(0);
  });

  it('runs the hire, message and complete workflow', async () => {
    const client = await signupAndLogin(app, 'client', 'c1@example.com');
    const rival = await signupAndLogin(app, 'client', 'c2@example.com');
    const f1 = await signupAndLogin(app, 'freelancer', 'f1@example.com');
    const f2 = await signupAndLogin(app, 'freelancer', 'f2@example.com');

    await request(app)
      .post('/post/')
      .set('Authorization', client.auth)
      .type('form')
      .send({ title: 'Job A', description: 'Build it', budget: '100' })
      .expect(302);
    const open = await request(app).get('/available-jobs/').set('Authorization', f1.auth).expect(200);
    const jobId: number = open.body.jobs[0].id;

    for (const freelancer of [f1, f2]) {
      await request(app)
        .post(`/apply/${jobId}/`)
        .set('Authorization', freelancer.auth)
        .type('form')
        .send({ applicant_name: 'Proxy Name', proposal: 'Pick me' })
        .expect(302)
        .expect('Location', '/available-jobs/');
    }

    const listing = await request(app).get(`/my-jobs/${jobId}/`).set('Authorization', client.auth).expect(200);
    const [first, second] = listing.body.applications;
    expect(first.applicant_user_id).toBe(f1.id);

    const denied = await request(app).post(`/application/${first.id}/accept/`).set('Authorization', rival.auth).expect(403);
    expect(denied.body).toEqual({ success: false, error: 'Not authorized to accept this application' });

    await request(app)
      .post(`/application/${first.id}/accept/`)
      .set('Authorization', client.auth)
      .expect(302)
      .expect('Location', `/my-jobs/${jobId}/`);

    await request(app)
      .post(`/messages/${jobId}/${f1.id}/`)
      .set('Authorization', client.auth)
      .type('form')
      .send({ content: 'Welcome aboard' })
      .expect(302)
      .expect('Location', `/messages/${jobId}/${f1.id}/`);

    const badge = await request(app).get('/').set('Authorization', f1.auth).expect(200);
    expect(badge.body.unreadMessageCount).toBe(1);

    const thread = await request(app).get(`/messages/${jobId}/${client.id}/`).set('Authorization', f1.auth).expect(200);
    expect(thread.body.messages).toHaveLength(1);
    expect(thread.body.messages[0]).toMatchObject({ content: 'Welcome aboard', read: true });
    expect(thread.body.unreadMessageCount).toBe(0);

    await request(app).get(`/messages/${jobId}/${client.id}/`).set('Authorization', f2.auth).expect(403);

    const inbox = await request(app).get('/my-conversations/').set('Authorization', client.auth).expect(200);
    expect(inbox.body.conversations).toHaveLength(1);
    expect(inbox.body.conversations[0]).toMatchObject({ unread_count: 0, other_user: { id: f1.id } });

    await request(app)
      .post(`/my-jobs/${jobId}/complete/`)
      .set('Authorization', client.auth)
      .expect(302)
      .expect('Location', '/my-jobs/?completed=1');

    const afterCompletion = await request(app).get('/my-jobs/?completed=1').set('Authorization', client.auth).expect(200);
    expect(afterCompletion.body.notice).toBe('Job marked as completed!');
    expect(afterCompletion.body.jobs).toEqual([]);

    const statuses = db
      .prepare<[number], { id: number; status: string }>('SELECT id, status FROM applications WHERE job_id = ? ORDER BY id')
      .all(jobId);
    expect(statuses).toEqual([
      { id: first.id, status: 'accepted' },
      { id: second.id, status: 'rejected' },
    ]);

    const mine = await request(app).get('/my-applications/').set('Authorization', f2.auth).expect(200);
    expect(mine.body.applications).toEqual([]);

    await request(app).post(`/application/${second.id}/delete/`).set('Authorization', f1.auth).expect(403);
    await request(app)
      .post(`/application/${second.id}/delete/`)
      .set('Authorization', f2.auth)
      .expect(302)
      .expect('Location', '/my-applications/');
  });

  it('only lets participants clear a conversation', async () => {
    const client = await signupAndLogin(app, 'client', 'c@example.com');
    const freelancer = await signupAndLogin(app, 'freelancer', 'f@example.com');
    await request(app)
      .post('/post/')
      .set('Authorization', client.auth)
      .type('form')
      .send({ title: 'T', description: 'D', budget: '5' })
      .expect(302);
    const jobId = db.prepare<[], { id: number }>('SELECT id FROM jobs').get()?.id ?? 0;

    await request(app)
      .post(`/messages/${jobId}/${freelancer.id}/`)
      .set('Authorization', client.auth)
      .type('form')
      .send({ content: 'hello' })
      .expect(302);
    await request(app).post(`/messages/${jobId}/${client.id}/clear/`).set('Authorization', freelancer.auth).expect(403);
    await request(app).post(`/messages/${jobId}/${freelancer.id}/clear/`).set('Authorization', client.auth).expect(302);

    expect(db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM messages').get()?.count).toBe(0);
  });

  it('answers bad ids with 404 and wrong methods with 405', async () => {
    const client = await signupAndLogin(app, 'client', 'c@example.com');

    await request(app).get('/my-jobs/abc/').set('Authorization', client.auth).expect(404);
    await request(app).post('/job/77/complete/').set('Authorization', client.auth).expect(404);
    const wrongMethod = await request(app).get('/application/1/accept/').set('Authorization', client.auth).expect(405);
    expect(wrongMethod.headers.allow).toBe('POST');
  });

  it('redirects home on logout', async () => {
    await request(app).get('/logout/').expect(302).expect('Location', '/');
  });
});
