export { CompanyApi, type CompanyInfo, type ProbeOptions, type RemoteDataApi } from './CompanyApi.js';
