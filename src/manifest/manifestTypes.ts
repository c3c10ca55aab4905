export type ManifestFunction = {
  name: string;
  returns: string;
  args: string[];
};

export type ManifestRecord = {
  fields: { name: string; type: string }[];
};

/** What a foreign-side loader needs to bind the generated library. */
export type BindingManifest = {
  functions: Record<string, ManifestFunction>;
  records: Record<string, ManifestRecord>;
};
