export type ObjectRef = {
  kind: string;
  namespace?: string;
  name: string;
};
