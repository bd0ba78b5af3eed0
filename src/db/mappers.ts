import type {
  Application,
  ApplicationStatus,
  Job,
  JobStatus,
  Message,
  Profile,
  PublicUser,
  Role,
  User,
} from '../types';

export interface UserRow extends User {
  password_hash: string;
}

export interface ProfileRow {
  user_id: number;
  role: string;
  created_at: string;
}

export interface JobRow {
  id: number;
  owner_id: number | null;
  owner_first_name?: string | null;
  owner_last_name?: string | null;
  title: string;
  description: string;
  budget: number;
  status: string;
  created_at: string;
}

export interface ApplicationRow {
  id: number;
  job_id: number;
  applicant_user_id: number | null;
  applicant_name: string;
  proposal: string;
  status: string;
  created_at: string;
}

export interface MessageRow {
  id: number;
  sender_id: number;
  receiver_id: number;
  job_id: number;
  content: string;
  read: number;
  timestamp: string;
}

const roles: readonly Role[] = ['client', 'freelancer'];
const jobStatuses: readonly JobStatus[] = ['open', 'in_progress', 'completed'];
const applicationStatuses: readonly ApplicationStatus[] = ['pending', 'accepted', 'rejected'];

const pick = <T extends string>(allowed: readonly T[], value: string, column: string): T => {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`Unexpected ${column} value in database: ${value}`);
  }
  return match;
};

export const displayName = (user: Pick<User, 'first_name' | 'last_name'>) =>
  `${user.first_name} ${user.last_name}`.trim();

export function mapUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    first_name: row.first_name,
    last_name: row.last_name,
    created_at: row.created_at,
  };
}

export function mapPublicUser(row: Pick<User, 'id' | 'username' | 'first_name' | 'last_name'>): PublicUser {
  return {
    id: row.id,
    username: row.username,
    first_name: row.first_name,
    last_name: row.last_name,
  };
}

export function mapProfile(row: ProfileRow): Profile {
  return {
    user_id: row.user_id,
    role: pick(roles, row.role, 'profiles.role'),
    created_at: row.created_at,
  };
}

export function mapJob(row: JobRow): Job {
  const job: Job = {
    id: row.id,
    owner_id: row.owner_id,
    title: row.title,
    description: row.description,
    budget: row.budget,
    status: pick(jobStatuses, row.status, 'jobs.status'),
    created_at: row.created_at,
  };
  if (row.owner_first_name != null || row.owner_last_name != null) {
    job.owner_name = displayName({
      first_name: row.owner_first_name ?? '',
      last_name: row.owner_last_name ?? '',
    });
  }
  return job;
}

export function mapApplication(row: ApplicationRow): Application {
  return {
    id: row.id,
    job_id: row.job_id,
    applicant_user_id: row.applicant_user_id,
    applicant_name: row.applicant_name,
    proposal: row.proposal,
    status: pick(applicationStatuses, row.status, 'applications.status'),
    created_at: row.created_at,
  };
}

export function mapMessage(row: MessageRow): Message {
  return {
    id: row.id,
    sender_id: row.sender_id,
    receiver_id: row.receiver_id,
    job_id: row.job_id,
    content: row.content,
    read: row.read === 1,
    timestamp: row.timestamp,
  };
}
