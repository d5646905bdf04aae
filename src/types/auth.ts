/** Participant authenticated by a Bearer JWT; `address` is the normalized `sub`. */
export type AuthParticipant = {
  type: "participant";
  address: string;
};

export type RequestAuth = AuthParticipant | null;
