export interface PlainTextObject {
  type: 'plain_text';
  text: string;
  emoji?: boolean;
}

export interface MrkdwnTextObject {
  type: 'mrkdwn';
  text: string;
}

export interface OptionObject {
  text: PlainTextObject;
  value: string;
}

export interface ButtonElement {
  type: 'button';
  action_id: string;
  text: PlainTextObject;
  value?: string;
  style?: 'primary' | 'danger';
}

export interface StaticSelectElement {
  type: 'static_select';
  action_id: string;
  placeholder: PlainTextObject;
  options: OptionObject[];
}

export interface PlainTextInputElement {
  type: 'plain_text_input';
  action_id: string;
  placeholder?: PlainTextObject;
  max_length?: number;
  dispatch_action_config?: {
    trigger_actions_on: Array<'on_enter_pressed' | 'on_character_entered'>;
  };
}

export interface SectionBlock {
  type: 'section';
  block_id?: string;
  text: MrkdwnTextObject;
  accessory?: StaticSelectElement | ButtonElement;
}

export interface ActionsBlock {
  type: 'actions';
  block_id?: string;
  elements: ButtonElement[];
}

export interface InputBlock {
  type: 'input';
  block_id?: string;
  label: PlainTextObject;
  element: PlainTextInputElement;
  dispatch_action?: boolean;
  optional?: boolean;
}

export type SlackBlock = SectionBlock | ActionsBlock | InputBlock;

/**
 * Outbound message content: `text` is the notification/fallback text, `blocks` the rich layout.
 */
export interface SlackMessageContent {
  text: string;
  blocks?: SlackBlock[];
}
