export type Role = 'client' | 'freelancer';

export type JobStatus = 'open' | 'in_progress' | 'completed';

export type ApplicationStatus = 'pending' | 'accepted' | 'rejected';

export interface User {
  id: number;
  username: string;
  email: string;
  first_name: string;
  last_name: string;
  created_at: string;
}

export interface Profile {
  user_id: number;
  role: Role;
  created_at: string;
}

export interface Job {
  id: number;
  owner_id: number | null;
  owner_name?: string;
  title: string;
  description: string;
  budget: number;
  status: JobStatus;
  created_at: string;
}

export interface OwnedJob extends Job {
  active_application_count: number;
}

export interface Application {
  id: number;
  job_id: number;
  applicant_user_id: number | null;
  applicant_name: string;
  proposal: string;
  status: ApplicationStatus;
  created_at: string;
}

export interface ApplicationWithJob extends Application {
  job: Job;
}

export interface Message {
  id: number;
  sender_id: number;
  receiver_id: number;
  job_id: number;
  content: string;
  read: boolean;
  timestamp: string;
}

export interface ConversationSummary {
  job: Job;
  other_user: PublicUser;
  last_message_time: string;
  unread_count: number;
}

export type PublicUser = Pick<User, 'id' | 'username' | 'first_name' | 'last_name'>;

/**
 * Who is making a request. Members without a profile keep `role: null`
 * and are turned away by every role gate.
 */
export type Principal =
  | { kind: 'anonymous' }
  | { kind: 'member'; user: User; role: Role | null };

export interface Member<R extends Role = Role> {
  user: User;
  role: R;
}

export type Client = Member<'client'>;
export type Freelancer = Member<'freelancer'>;

export interface NavLink {
  name: string;
  url: string;
}
