export interface RequestMetadata {
  session_id: string;
  ip_address: string;
  user_agent: string;
  request_id: string;
}
