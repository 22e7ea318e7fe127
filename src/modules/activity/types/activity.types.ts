export const ACTIVITY_ACTIONS = [
  'login',
  'logout',
  'create_credential',
  'view_credential',
  'update_credential',
  'delete_credential',
  'create_note',
  'view_note',
  'update_note',
  'delete_note',
  'export_data',
] as const;

export type ActivityAction = (typeof ACTIVITY_ACTIONS)[number];

export type ActivityEntry = {
  id: string;
  action: string;
  description: string;
  ipAddress: string | null;
  createdAt: Date;
};
