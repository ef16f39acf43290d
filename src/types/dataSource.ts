/**
 * 采集端点名称。
 */
export type EndpointName =
  | 'floorsheet'
  | 'price_volume'
  | 'live_market'
  | 'summary'
  | 'top_gainers'
  | 'top_losers'
  | 'nepse_index'
  | 'supply_demand';

/**
 * 采集端点定义（名称与请求路径）。
 */
export type EndpointDefinition = {
  readonly name: EndpointName;
  readonly path: string;
};

/**
 * 快照分段。
 * 类型用途：单个端点返回的原始数据，payload 为记录数组或单个记录对象。
 * 数据来源：数据源 fetchSnapshot。
 * 使用范围：数据源、采集器。
 */
export type SnapshotSection = {
  readonly source: EndpointName;
  readonly payload: ReadonlyArray<unknown> | Readonly<Record<string, unknown>>;
};

/**
 * 端点失败记录。
 */
export type EndpointFailure = {
  readonly source: EndpointName;
  readonly reason: string;
};

/**
 * 一次采集得到的市场快照。
 */
export type MarketSnapshot = {
  readonly sections: ReadonlyArray<SnapshotSection>;
  readonly failedEndpoints: ReadonlyArray<EndpointFailure>;
};

/**
 * 快照获取结果。
 * 类型用途：区分正常数据与上游报告的休市状态（休市不是错误）。错误以 DataSourceError 抛出。
 * 数据来源：数据源 fetchSnapshot。
 * 使用范围：数据源、采集器。
 */
export type SnapshotFetchResult =
  | { readonly status: 'ok'; readonly snapshot: MarketSnapshot }
  | { readonly status: 'closed'; readonly detail: string };

/**
 * 数据源错误类别。
 * - timeout：请求超时
 * - transport：网络层错误或非成功状态码
 * - malformed：可达但响应无法解析
 */
export type DataSourceErrorType = 'timeout' | 'transport' | 'malformed';

/**
 * 数据源错误。
 * 类型用途：数据源抛出的带类别错误，由采集器归类为运行结果。
 * 数据来源：createDataSourceError。
 * 使用范围：数据源、采集器、错误工具。
 */
export type DataSourceError = Error & {
  readonly name: 'DataSourceError';
  readonly errorType: DataSourceErrorType;
};

/**
 * 行情数据源接口（行为契约）。
 * 与具体传输格式无关，测试中可用替身实现。
 * probe 在服务不可达时返回 false，探测超时则抛出 timeout 类别的 DataSourceError。
 */
export interface DataSource {
  probe(): Promise<boolean>;
  fetchSnapshot(): Promise<SnapshotFetchResult>;
}
