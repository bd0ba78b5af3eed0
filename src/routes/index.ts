import { Router } from 'express';
import { ApplicationController } from '../controller/application.controller';
import { AuthController } from '../controller/auth.controller';
import { JobController } from '../controller/job.controller';
import { MessageController } from '../controller/message.controller';
import { PageRenderer } from '../controller/page';
import { methodNotAllowed } from '../middleware/error.middleware';
import type { Services } from '../services';

export const createRoutes = (services: Services) => {
  const router = Router();
  const pages = new PageRenderer(services.messages);

  const auth = new AuthController(services.identity, pages);
  const jobs = new JobController(services.jobs, services.applications, pages);
  const applications = new ApplicationController(services.applications, pages);
  const messages = new MessageController(services.messages, pages);

  const getOnly = methodNotAllowed(['GET']);
  const postOnly = methodNotAllowed(['POST']);
  const form = methodNotAllowed(['GET', 'POST']);

  router.route('/').get(auth.home).all(getOnly);

  // Identity
  router.route('/signup/').get(auth.chooseRole).all(getOnly);
  router.route('/signup/client/').get(auth.signupForm('client')).post(auth.signup('client')).all(form);
  router.route('/signup/freelancer/').get(auth.signupForm('freelancer')).post(auth.signup('freelancer')).all(form);
  router.route('/join/').get(auth.loginForm).post(auth.login).all(form);
  router.route('/logout/').get(auth.logout).post(auth.logout).all(form);

  // Jobs
  router.route('/available-jobs/').get(jobs.availableJobs).all(getOnly);
  router.route('/post/').get(jobs.postJobForm).post(jobs.postJob).all(form);
  router.route('/apply/:jobId/').get(jobs.applyForm).post(jobs.apply).all(form);
  router.route('/my-jobs/').get(jobs.myJobs).all(getOnly);
  router.route('/my-jobs/:jobId/').get(jobs.jobApplications).all(getOnly);
  router.route('/job/:jobId/complete/').post(jobs.completeJob).all(postOnly);
  router.route('/my-jobs/:jobId/complete/').post(jobs.completeJob).all(postOnly);

  // Applications
  router.route('/my-applications/').get(applications.myApplications).all(getOnly);
  router.route('/application/:appId/accept/').post(applications.accept).all(postOnly);
  router.route('/application/:appId/reject/').post(applications.reject).all(postOnly);
  router.route('/application/:appId/delete/').post(applications.remove).all(postOnly);

  // Messages
  router.route('/messages/:jobId/:userId/').get(messages.thread).post(messages.post).all(form);
  router.route('/messages/:jobId/:userId/clear/').post(messages.clear).all(postOnly);
  router.route('/my-conversations/').get(messages.conversations).all(getOnly);

  return router;
};
