/**
 * SMPP 3.4 command_status values used by the client session.
 * Carried in every response PDU; 0 means success.
 */
export const CommandStatus = {
  ESME_ROK: 0x00000000,
  ESME_RINVMSGLEN: 0x00000001,
  ESME_RINVCMDLEN: 0x00000002,
  ESME_RINVCMDID: 0x00000003,
  ESME_RINVBNDSTS: 0x00000004,
  ESME_RALYBND: 0x00000005,
  ESME_RSYSERR: 0x00000008,
  ESME_RINVSRCADR: 0x0000000A,
  ESME_RINVDSTADR: 0x0000000B,
  ESME_RBINDFAIL: 0x0000000D,
  ESME_RINVPASWD: 0x0000000E,
  ESME_RINVSYSID: 0x0000000F,
  ESME_RCANCELFAIL: 0x00000011,
  ESME_RMSGQFUL: 0x00000014,
  ESME_RSUBMITFAIL: 0x00000045,
  ESME_RTHROTTLED: 0x00000058,
  ESME_RUNKNOWNERR: 0x000000FF,
} as const;

export type KnownCommandStatus = typeof CommandStatus[keyof typeof CommandStatus];

const STATUS_NAMES = new Map<number, string>(
  Object.entries(CommandStatus).map(([name, code]) => [code, name]),
);

/** Human-readable status for logs: "ESME_RINVPASWD (0x0000000E)". */
export function describeStatus(status: number): string {
  const hex = '0x' + status.toString(16).toUpperCase().padStart(8, '0');
  const name = STATUS_NAMES.get(status);
  return name ? `${name} (${hex})` : hex;
}
