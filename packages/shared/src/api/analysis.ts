export type DtcExplanation = {
  title: string;
  severity: string;
  description: string;
  causes: string[];
  fixes: string[];
};

export type LatestDtcResponse = {
  code: string | null;
};

export type DtcFeedMessage = {
  type: "dtc";
  code: string;
  ts: string;
};
