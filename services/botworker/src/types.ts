export type ParticipantCode = string;
export type SessionCode = string;

export type PostData = Record<string, unknown>;

// Shape that crosses the wire (page_class already removed)
export interface WireSubmission {
  post_data: PostData;
  [field: string]: unknown;
}

// What bot logic yields; page_class names the page that produced it
export interface SubmissionDescriptor extends WireSubmission {
  page_class?: string;
}

// Placeholder stored when the sequence is exhausted
export type EmptySubmission = Record<string, never>;

export type PreparedSubmit = WireSubmission | EmptySubmission;

export type Ack = { ok: true };

export type RequestErrorReply = { request_error: string };

export type ResponseErrorReply = { response_error: string; traceback: string };

export type PrepareNextSubmitResult = PreparedSubmit | RequestErrorReply;

export type WireResponse = { [field: string]: unknown };
