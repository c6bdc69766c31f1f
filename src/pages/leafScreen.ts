import type { AppDescriptor } from '../types/apps';

export type LeafScreenProps = {
  app: AppDescriptor;
  onExit: () => void;
};
