export type AppId =
  | 'weather'
  | 'calculator'
  | 'notes'
  | 'settings'
  | 'clock'
  | 'calendar'
  | 'photos'
  | 'messages'
  | 'phone'
  | 'safari'
  | 'mail'
  | 'music'
  | 'appStore'
  | 'camera';

export type AppDescriptor = {
  readonly id: AppId;
  readonly name: string;
  readonly icon: string;
  readonly color: string;
  // Leaf screens that paint their own gradient background instead of a flat fill.
  readonly gradient: boolean;
};

export type DismissReason = 'back' | 'volume' | 'keyboard';

export type LauncherState =
  | {
      status: 'hidden';
    }
  | {
      status: 'presenting';
      app: AppDescriptor;
    };
