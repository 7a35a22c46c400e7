export interface UserSummary {
  id: string;
  name: string;
  email: string;
}

/** The visitor behind the current request: a signed-in user, or nobody. */
export type Identity =
  | { kind: 'anonymous' }
  | { kind: 'user'; user: UserSummary };

export const ANONYMOUS: Identity = Object.freeze({ kind: 'anonymous' });

export interface Author {
  id: string;
  name: string;
}

export interface PostSummary {
  id: number;
  title: string;
  subtitle: string;
  date: string;
  author: Author;
}

export interface Post extends PostSummary {
  body: string;
  imgUrl: string;
}

export interface CommentView {
  id: number;
  text: string;
  author: Author;
  avatarUrl: string;
}

export interface PostWithComments {
  post: Post;
  comments: CommentView[];
}

export interface PostInput {
  title: string;
  subtitle: string;
  imgUrl: string;
  body: string;
}

export interface RegisterInput {
  name: string;
  email: string;
  password: string;
}

export interface LoginInput {
  email: string;
  password: string;
}

/** What every rendered page knows about the visitor. */
export interface Viewer {
  loggedIn: boolean;
  isAdmin: boolean;
  name: string | null;
}
