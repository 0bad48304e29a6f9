import type AppService from '../../app-config/service';
import type ParameterSet from '../../params/parameter-set';

export const DEBUGGING_ENDPOINT = 'debugging';

// Reports and debugging sessions take about this long to be processed and emailed
const EMAIL_DELAY_MINUTES = 10;

export interface LaunchResult {
  status: number;
  body: string;
}

export default class LaunchUtils {
  static async launch(app: AppService, endpoint: string, params: ParameterSet): Promise<LaunchResult> {
    const { status, data } = await app.api.post<string>(`/launch/${encodeURIComponent(endpoint)}`, {
      params: params.toWireValue(),
    });
    return { status, body: data };
  }

  static async launchTestRun(app: AppService, webhook: string, params: ParameterSet): Promise<LaunchResult> {
    return LaunchUtils.launch(app, webhook, params);
  }

  static async launchDebuggingSession(app: AppService, params: ParameterSet): Promise<LaunchResult> {
    return LaunchUtils.launch(app, DEBUGGING_ENDPOINT, params);
  }

  /**
   * When the email for a launch should arrive. Test runs add their duration in minutes.
   */
  static estimateEmailTime(params?: ParameterSet, now = new Date()): Date {
    const duration = params?.get('antithesis.duration');
    let duration_minutes = typeof duration === 'string' && /^[0-9]+$/.test(duration) ? parseInt(duration, 10) : 0;
    if (!Number.isSafeInteger(duration_minutes)) {
      duration_minutes = 0;
    }

    const estimate = new Date(now.getTime() + (duration_minutes + EMAIL_DELAY_MINUTES) * 60 * 1000);
    // Beyond the representable date range
    if (Number.isNaN(estimate.getTime())) {
      return new Date(now.getTime() + EMAIL_DELAY_MINUTES * 60 * 1000);
    }
    return estimate;
  }
}
